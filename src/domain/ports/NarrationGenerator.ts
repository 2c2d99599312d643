export interface NarrationOptions {
  readonly signal?: AbortSignal;
}

/** Black-box text generator: prompt in, text out. May be slow or fail. */
export interface NarrationGenerator {
  generate(prompt: string, options?: NarrationOptions): Promise<string>;
}
