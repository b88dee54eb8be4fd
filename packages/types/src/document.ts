export type FileType = "txt" | "md" | "pdf" | "docx" | "html" | "unknown";

/**
 * A loaded source document. Format-specific parsing happens upstream;
 * by the time a Document reaches the chunker it is plain text.
 */
export interface Document {
  id: string;
  sourcePath: string;
  rawText: string;
  fileType: FileType;
}
