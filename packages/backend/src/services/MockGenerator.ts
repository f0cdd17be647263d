import type { GenerationBackend } from "./llmTypes.js";

/** Offline generation backend for development and tests; echoes the prompt's best code. */
export class MockGenerator implements GenerationBackend {
  readonly backendName = "mock";

  async generate(prompt: string): Promise<string> {
    const code = prompt.match(/HSN Code: (\d{8})/)?.[1];
    if (!code) {
      return "Mock answer: no candidate codes were supplied.";
    }
    return `Mock answer: the most likely classification is HSN Code ${code}.`;
  }
}
