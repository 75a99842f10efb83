import { z } from "zod";

export type OllamaRole = "system" | "user" | "assistant";

export interface OllamaMessage {
  role: OllamaRole;
  content: string;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaMessage[];
  format?: "json";
  stream?: false;
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
  };
}

const OllamaChatResponseSchema = z.object({
  model: z.string(),
  created_at: z.string().optional(),
  message: z.object({
    role: z.enum(["system", "user", "assistant"]),
    content: z.string(),
  }),
  done: z.boolean(),
  total_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export type OllamaChatResponse = z.infer<typeof OllamaChatResponseSchema>;

export interface CircuitBreakerState {
  open: boolean;
  failureCount: number;
  openedAt?: number;
}

export interface OllamaClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  circuitBreakerThreshold?: number;
  circuitBreakerResetMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
  onCircuitOpen?: (state: CircuitBreakerState) => void;
}

export type OllamaRequestOptions = {
  signal?: AbortSignal;
};

export class OllamaRequestError extends Error {
  public readonly details: { status?: number; attempts: number };

  constructor(message: string, details: OllamaRequestError["details"]) {
    super(message);
    this.name = "OllamaRequestError";
    this.details = details;
  }
}

export class OllamaClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly circuitBreakerThreshold: number;
  private readonly circuitBreakerResetMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly onCircuitOpen?: (state: CircuitBreakerState) => void;

  private state: CircuitBreakerState = {
    open: false,
    failureCount: 0,
  };

  constructor(options: OllamaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retries = options.retries ?? 2;
    this.backoffMs = options.backoffMs ?? 500;
    this.circuitBreakerThreshold = options.circuitBreakerThreshold ?? 5;
    this.circuitBreakerResetMs = options.circuitBreakerResetMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
    this.onCircuitOpen = options.onCircuitOpen;
  }

  get circuit(): Readonly<CircuitBreakerState> {
    return this.state;
  }

  async chat(request: OllamaChatRequest, options: OllamaRequestOptions = {}): Promise<OllamaChatResponse> {
    const body = await this.request("/api/chat", { ...request, stream: false }, options.signal);
    const parsed = OllamaChatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new OllamaRequestError(`Ollama returned an unexpected chat payload: ${parsed.error.message}`, {
        attempts: 1,
      });
    }
    return parsed.data;
  }

  private async request(path: string, payload: unknown, signal: AbortSignal | undefined): Promise<unknown> {
    this.resetCircuitIfExpired();
    if (this.state.open) {
      throw new OllamaRequestError("Ollama circuit breaker is open", { attempts: 0 });
    }

    let attempt = 0;
    let lastError: unknown;

    while (attempt <= this.retries) {
      try {
        const body = await this.postWithTimeout(`${this.baseUrl}${path}`, payload, signal, attempt + 1);
        this.onSuccess();
        return body;
      } catch (error) {
        lastError = error;
        attempt += 1;

        // Caller cancellation is not a provider fault.
        if (signal?.aborted) {
          throw error;
        }
        this.onFailure();

        if (attempt > this.retries || this.state.open) {
          break;
        }

        await this.wait(this.backoffMs * attempt, signal);
      }
    }

    throw lastError instanceof Error ? lastError : new OllamaRequestError("Unknown Ollama client error", { attempts: attempt });
  }

  // Timer and caller signal cover the whole exchange, body included.
  private async postWithTimeout(
    url: string,
    payload: unknown,
    signal: AbortSignal | undefined,
    attempt: number,
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort("timeout"), this.timeoutMs);
    const onAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      onAbort();
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        const text = await response.text();
        throw new OllamaRequestError(`Ollama request failed (${response.status}): ${text}`, {
          status: response.status,
          attempts: attempt,
        });
      }

      const body: unknown = await response.json();
      return body;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private onSuccess(): void {
    this.state = { open: false, failureCount: 0 };
  }

  private onFailure(): void {
    const failureCount = this.state.failureCount + 1;
    if (failureCount >= this.circuitBreakerThreshold) {
      this.state = {
        open: true,
        failureCount,
        openedAt: this.now(),
      };
      this.onCircuitOpen?.(this.state);
      return;
    }

    this.state = {
      open: false,
      failureCount,
    };
  }

  private resetCircuitIfExpired(): void {
    if (!this.state.open || this.state.openedAt === undefined) {
      return;
    }

    if (this.now() - this.state.openedAt >= this.circuitBreakerResetMs) {
      this.state = {
        open: false,
        failureCount: 0,
      };
    }
  }

  private wait(ms: number, signal: AbortSignal | undefined): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new OllamaRequestError("Ollama request cancelled", { attempts: 0 }));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
