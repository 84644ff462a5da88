import { BaseError } from './base.error.js';

export type MetadataFailureKind = 'grammar' | 'validation';

interface AppErrorOptions {
  readonly code: string;
  readonly message: string;
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
  readonly exposeMessage?: boolean;
}

export class AppError extends BaseError {
  private constructor(options: AppErrorOptions) {
    super({
      code: options.code,
      message: options.message,
      metadata: options.metadata,
      cause: options.cause,
      exposeMessage: options.exposeMessage ?? false,
    });
  }

  public static fromUnknown(error: unknown, code = 'UNEXPECTED_ERROR'): AppError {
    if (error instanceof AppError) {
      return error;
    }

    const cause = error instanceof Error ? error : new Error('Unknown error');
    return new AppError({ code, message: cause.message, cause, exposeMessage: false });
  }

  public static validation(code: string, metadata: Record<string, unknown>): AppError {
    return new AppError({
      code,
      message: 'Validation failed for the provided payload.',
      metadata,
      exposeMessage: true,
    });
  }

  public static unsupported(
    code: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): AppError {
    return new AppError({
      code,
      message,
      metadata,
      exposeMessage: false,
    });
  }

  /**
   * Failure raised while reading a metadata document. `grammar` means the text
   * did not have the expected shape, `validation` means it did but the typed
   * record could not be built from it.
   */
  public static invalidMetadata(
    kind: MetadataFailureKind,
    message: string,
    metadata: Record<string, unknown> = {},
    cause?: unknown,
  ): AppError {
    return new AppError({
      code: `dmi-metadata.${kind}`,
      message,
      metadata: { kind, ...metadata },
      cause,
      exposeMessage: true,
    });
  }

  public get failureKind(): MetadataFailureKind | undefined {
    const { kind } = this.metadata;
    return kind === 'grammar' || kind === 'validation' ? kind : undefined;
  }
}
