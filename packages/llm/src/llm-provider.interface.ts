import type { GenerationOptions, GenerationResult } from "@groundline/types";

export interface ILlmProvider {
  readonly name: string;
  readonly model: string;

  /** Aborting `signal` cancels the in-flight request. */
  generate(
    prompt: string,
    options: GenerationOptions,
    signal?: AbortSignal,
  ): Promise<GenerationResult>;
}
