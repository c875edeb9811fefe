export interface InferOptions {
  /** Trusted instructions sent ahead of the prompt. */
  readonly system?: string;
  /** Usage bucket, e.g. "decide" or "importance". */
  readonly label?: string;
  readonly temperature?: number;
}

/** A black-box text model. Callers parse its output defensively. */
export interface Oracle {
  infer(prompt: string, maxOutput: number, options?: InferOptions): Promise<string>;
}

export interface UsageCounter {
  calls: number;
  failures: number;
  promptTokens: number;
  completionTokens: number;
}

export type UsageReport = Record<string, UsageCounter>;
