import { z } from "zod";

import type { Logger, NarrationGenerator, NarrationOptions } from "../core.js";

interface OllamaNarrationGeneratorOptions {
  readonly endpoint?: string;
  readonly model?: string;
  readonly logger?: Logger;
}

const GenerateResponseSchema = z.object({
  response: z.string(),
});

/** Narration through Ollama's non-streaming generate endpoint. */
export class OllamaNarrationGenerator implements NarrationGenerator {
  readonly #endpoint: string;
  readonly #model: string;
  readonly #logger: Logger | undefined;

  constructor({
    endpoint = "http://localhost:11434/api/generate",
    model = "dolphin-mixtral",
    logger,
  }: OllamaNarrationGeneratorOptions = {}) {
    this.#endpoint = endpoint;
    this.#model = model;
    this.#logger = logger;
  }

  async generate(prompt: string, { signal }: NarrationOptions = {}): Promise<string> {
    const started = Date.now();
    const response = await fetch(this.#endpoint, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: this.#model, prompt, stream: false }),
      ...(signal ? { signal } : {}),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Ollama narration failed: ${response.status} ${text}`);
    }

    const parsed = GenerateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("Ollama response did not include generated text");
    }

    this.#logger?.debug?.("Narration generated", {
      model: this.#model,
      ms: Date.now() - started,
    });
    return parsed.data.response.trim();
  }
}
