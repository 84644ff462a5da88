export interface BaseErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage: boolean;
}

export abstract class BaseError extends Error {
  public readonly code: string;

  public readonly metadata: Record<string, unknown>;

  public readonly exposeMessage: boolean;

  protected constructor(options: BaseErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.metadata = options.metadata ?? {};
    this.exposeMessage = options.exposeMessage;
  }

  /** Message safe to show to callers outside the process. */
  public get publicMessage(): string {
    return this.exposeMessage ? this.message : 'An unexpected error occurred.';
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.publicMessage,
      metadata: this.metadata,
    };
  }
}
