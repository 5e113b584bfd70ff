import type {
  ModelClient,
  ModelPrompt,
  ModelResponse,
} from "../../src/summarizer/model-client.js";

/**
 * In-process {@link ModelClient} that answers from a script and records
 * every prompt it receives.
 */
export class FakeModelClient implements ModelClient {
  readonly model = "fake-model";
  readonly prompts: ModelPrompt[] = [];

  constructor(private readonly answer: (prompt: ModelPrompt, call: number) => ModelResponse) {}

  /** Answer every call with the same text. */
  static echoing(text: string): FakeModelClient {
    return new FakeModelClient(() => ({ kind: "text", text }));
  }

  /** Answer call N with `texts[N]`; calls past the end reuse the last entry. */
  static scripted(...texts: string[]): FakeModelClient {
    return new FakeModelClient((_, call) => ({
      kind: "text",
      text: texts[Math.min(call, texts.length - 1)] ?? "",
    }));
  }

  async generate(prompt: ModelPrompt): Promise<ModelResponse> {
    const call = this.prompts.length;
    this.prompts.push(prompt);
    return this.answer(prompt, call);
  }

  /** The text of the prompt sent on call N. */
  promptText(call: number): string {
    return this.prompts[call]?.parts.map((part) => part.text).join("") ?? "";
  }
}
