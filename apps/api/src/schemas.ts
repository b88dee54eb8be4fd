import { z } from "zod";
import { ValidationError } from "@groundline/errors";
import type { FileType } from "@groundline/types";

export const chatRequestSchema = z.object({
  userId: z.string().min(1).max(256),
  message: z.string(),
});

const FILE_TYPES = ["txt", "md", "pdf", "docx", "html", "unknown"] as const satisfies readonly FileType[];

export const ingestRequestSchema = z.object({
  documents: z
    .array(
      z.object({
        id: z.string().min(1).max(256),
        sourcePath: z.string().min(1),
        rawText: z.string(),
        fileType: z.enum(FILE_TYPES).optional(),
      }),
    )
    .min(1),
  rebuild: z.boolean().default(false),
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

export const userParamsSchema = z.object({
  userId: z.string().min(1).max(256),
});

/** Parse `value` or throw a ValidationError listing each failing field. */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  what: string,
): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const fields: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    fields[path] ??= issue.message;
  }
  throw new ValidationError(`Invalid ${what}`, fields, { details: { fields } });
}

/** Best guess from the file extension when the caller does not say. */
export function fileTypeOf(sourcePath: string): FileType {
  const extension = sourcePath.slice(sourcePath.lastIndexOf(".") + 1).toLowerCase();
  switch (extension) {
    case "txt":
    case "md":
    case "pdf":
    case "docx":
    case "html":
      return extension;
    case "markdown":
      return "md";
    case "htm":
      return "html";
    default:
      return "unknown";
  }
}
