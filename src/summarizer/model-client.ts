/**
 * @module summarizer/model-client
 * @fileoverview The seam between the summarizer and the hosted model.
 *
 * The summarizer depends only on {@link ModelClient}; {@link GeminiModelClient}
 * is the production implementation over `@google/genai`. Each client owns
 * its own SDK instance and API key, so nothing is configured process-wide.
 *
 * Responses are normalized into the {@link ModelResponse} union: some SDK
 * responses carry a flat text payload, others only structured candidate
 * parts.
 */

import { GoogleGenAI } from "@google/genai";

/** One user turn sent to the model. */
export interface ModelPrompt {
  role: "user";
  parts: Array<{ text: string }>;
}

/** What came back from one model call. */
export type ModelResponse =
  | { kind: "text"; text: string }
  | { kind: "parts"; parts: string[] }
  | { kind: "empty" };

/** Anything that can answer a prompt. */
export interface ModelClient {
  /** Model identifier, opaque to the pipeline. */
  readonly model: string;
  generate(prompt: ModelPrompt): Promise<ModelResponse>;
}

/**
 * The subset of the SDK's `GenerateContentResponse` read here.
 */
export interface GeminiResponseLike {
  readonly text?: string | undefined;
  readonly candidates?: ReadonlyArray<{
    content?: { parts?: ReadonlyArray<{ text?: string }> };
  }>;
}

/**
 * Map an SDK response onto {@link ModelResponse}.
 *
 * The flat `text` accessor wins when it yields a string; otherwise the text
 * of the first candidate's parts is used.
 */
export function toModelResponse(response: GeminiResponseLike): ModelResponse {
  const text = response.text;
  if (typeof text === "string") {
    return { kind: "text", text };
  }

  const parts = response.candidates?.[0]?.content?.parts;
  if (parts) {
    return { kind: "parts", parts: parts.map((part) => part.text ?? "") };
  }

  return { kind: "empty" };
}

/** Flatten a {@link ModelResponse} to its text payload. */
export function responseText(response: ModelResponse): string {
  switch (response.kind) {
    case "text":
      return response.text;
    case "parts":
      return response.parts.join("");
    case "empty":
      return "";
  }
}

export interface GeminiClientOptions {
  apiKey: string;
  /** @default "gemini-2.5-flash" */
  model?: string;
  /**
   * Ask the endpoint for `application/json` output.
   *
   * @default true
   */
  jsonMode?: boolean;
}

/**
 * {@link ModelClient} backed by the Gemini API.
 *
 * @example
 * ```ts
 * const client = new GeminiModelClient({ apiKey: loadApiKey(), model: "gemini-2.5-flash" });
 * const response = await client.generate({ role: "user", parts: [{ text: "Hello" }] });
 * ```
 */
export class GeminiModelClient implements ModelClient {
  readonly model: string;
  private readonly jsonMode: boolean;
  private readonly ai: GoogleGenAI;

  constructor(options: GeminiClientOptions) {
    this.model = options.model ?? "gemini-2.5-flash";
    this.jsonMode = options.jsonMode ?? true;
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async generate(prompt: ModelPrompt): Promise<ModelResponse> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: [prompt],
      config: this.jsonMode ? { responseMimeType: "application/json" } : undefined,
    });
    return toModelResponse(response);
  }
}
