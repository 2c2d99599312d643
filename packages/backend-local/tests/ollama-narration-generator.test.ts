import { afterEach, describe, expect, it, vi } from "vitest";

import { OllamaNarrationGenerator } from "../src/adapters/OllamaNarrationGenerator.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("OllamaNarrationGenerator", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a non-streaming generate request and trims the answer", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ response: "  The fog lifts.\n" }));
    vi.stubGlobal("fetch", fetchMock);

    const generator = new OllamaNarrationGenerator({
      endpoint: "http://ollama.test/api/generate",
      model: "test-model",
    });

    await expect(generator.generate("Event: intro.")).resolves.toBe("The fog lifts.");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://ollama.test/api/generate");
    expect(init).toMatchObject({
      method: "POST",
      headers: { "Content-Type": "application/json" },
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      prompt: "Event: intro.",
      stream: false,
    });
  });

  it("forwards the abort signal", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ response: "ok" }));
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();

    await new OllamaNarrationGenerator().generate("prompt", { signal: controller.signal });

    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ signal: controller.signal });
  });

  it("reports non-ok responses with status and body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("model not loaded", { status: 503 })),
    );

    await expect(new OllamaNarrationGenerator().generate("prompt")).rejects.toThrow(
      "Ollama narration failed: 503 model not loaded",
    );
  });

  it("rejects answers without generated text", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ done: true })));

    await expect(new OllamaNarrationGenerator().generate("prompt")).rejects.toThrow(
      "Ollama response did not include generated text",
    );
  });
});
