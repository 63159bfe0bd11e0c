import type { EmbeddingModel, GenerateOptions, Model } from "../src/ensemble/models/types.js";

type Reply = string | ((prompt: string) => string);

/**
 * Returns queued replies in order; the last one repeats once the queue is empty.
 */
export class ScriptedModel implements Model {
  readonly provider = "test";
  readonly model: string;
  readonly prompts: string[] = [];
  private readonly replies: Reply[];

  constructor(replies: Reply[], model = "scripted") {
    this.replies = [...replies];
    this.model = model;
  }

  generate(prompt: string, _options?: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) return Promise.resolve("");
    return Promise.resolve(typeof reply === "function" ? reply(prompt) : reply);
  }
}

/**
 * Streams each reply in fixed-size chunks.
 */
export class ChunkedModel extends ScriptedModel {
  private readonly chunkSize: number;

  constructor(replies: Reply[], chunkSize = 4) {
    super(replies, "chunked");
    this.chunkSize = chunkSize;
  }

  async *stream(prompt: string, options?: GenerateOptions): AsyncGenerator<string, void, undefined> {
    const text = await this.generate(prompt, options);
    for (let i = 0; i < text.length; i += this.chunkSize) {
      yield text.slice(i, i + this.chunkSize);
    }
  }
}

/**
 * Never resolves until aborted.
 */
export class HangingModel implements Model {
  readonly provider = "test";
  readonly model = "hanging";

  generate(_prompt: string, options?: GenerateOptions): Promise<string> {
    return new Promise((_resolve, reject) => {
      options?.signal?.addEventListener("abort", () => reject(new Error("aborted by signal")));
    });
  }
}

/**
 * Streams `first`, then waits forever without looking at its signal.
 */
export class StalledStreamModel implements Model {
  readonly provider = "test";
  readonly model = "stalled";
  private readonly first: string;

  constructor(first = "Thinking") {
    this.first = first;
  }

  generate(_prompt: string, _options?: GenerateOptions): Promise<string> {
    return new Promise(() => undefined);
  }

  async *stream(_prompt: string, _options?: GenerateOptions): AsyncGenerator<string, void, undefined> {
    yield this.first;
    await new Promise<void>(() => undefined);
  }
}

/**
 * Streams each reply word by word and records when its stream is closed.
 */
export class ClosableStreamModel extends ScriptedModel {
  closed = false;

  async *stream(prompt: string, options?: GenerateOptions): AsyncGenerator<string, void, undefined> {
    const text = await this.generate(prompt, options);
    try {
      for (const word of text.split(" ")) {
        yield `${word} `;
      }
    } finally {
      this.closed = true;
    }
  }
}

/**
 * Embeds text as keyword counts over a fixed vocabulary.
 */
export class KeywordEmbeddingModel implements EmbeddingModel {
  readonly provider = "test";
  readonly calls: string[][] = [];
  private readonly vocabulary: string[];

  constructor(vocabulary: string[]) {
    this.vocabulary = vocabulary;
  }

  embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return Promise.resolve(
      texts.map((text) => {
        const lowered = text.toLowerCase();
        return this.vocabulary.map((word) => (lowered.includes(word) ? 1 : 0));
      })
    );
  }
}

export async function collect<T, R>(generator: AsyncGenerator<T, R, undefined>): Promise<{ items: T[]; result: R }> {
  const items: T[] = [];
  let step = await generator.next();
  while (!step.done) {
    items.push(step.value);
    step = await generator.next();
  }
  return { items, result: step.value };
}
