export interface GenerationRequest {
  readonly prompt: string;
  readonly model?: string;
  readonly system?: string;
  readonly signal?: AbortSignal;
}

/**
 * The text-generation capability judges and the content improver depend on.
 * Calls are fallible and non-deterministic.
 */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}
