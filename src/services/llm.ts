import fetch, { FetchError, type Response } from "node-fetch";
import { z } from "zod";
import { LlmError, getErrorMessage } from "../errors";

export interface LlmClient {
  readonly model: string;
  readonly url: string;
  generate(prompt: string): Promise<string>;
}

export type OllamaClientOptions = {
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
};

const GenerateResponse = z.object({ response: z.string() });

export class OllamaClient implements LlmClient {
  readonly model: string;
  readonly url: string;

  constructor(private readonly options: OllamaClientOptions) {
    this.model = options.model;
    this.url = options.baseUrl.replace(/\/+$/, "");
  }

  async generate(prompt: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.url}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          options: {
            temperature: this.options.temperature,
            num_predict: this.options.maxTokens,
          },
        }),
        timeout: this.options.timeoutMs,
      });
    } catch (error) {
      // FetchError of type "system" is a refused or reset connection
      const unreachable = error instanceof FetchError && error.type === "system";
      throw new LlmError(getErrorMessage(error), unreachable, error);
    }

    if (!response.ok) {
      const detail = await response.text();
      throw new LlmError(`${response.status} ${response.statusText} ${detail}`.trim(), false);
    }

    const parsed = GenerateResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new LlmError("Response missing generated text", false);
    }
    return parsed.data.response.trim();
  }
}
