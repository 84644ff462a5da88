import { AppError, type MetadataFailureKind } from '../../../shared/errors/app-error.js';

export interface SourceLine {
  readonly text: string;
  /** 1-based. */
  readonly number: number;
  readonly start: number;
  /** Whether a `\n` follows the line. */
  readonly terminated: boolean;
}

/**
 * Forward-only reader over the lines of a metadata document.
 */
export class LineCursor {
  private offset = 0;

  private lineNumber = 1;

  public constructor(private readonly input: string) {}

  public get atEnd(): boolean {
    return this.offset >= this.input.length;
  }

  public get remaining(): string {
    return this.input.slice(this.offset);
  }

  public get position(): number {
    return this.offset;
  }

  public peek(): SourceLine | undefined {
    if (this.atEnd) {
      return undefined;
    }

    const newline = this.input.indexOf('\n', this.offset);
    const end = newline === -1 ? this.input.length : newline;

    return {
      text: this.input.slice(this.offset, end),
      number: this.lineNumber,
      start: this.offset,
      terminated: newline !== -1,
    };
  }

  public advance(line: SourceLine): void {
    this.offset = line.start + line.text.length + (line.terminated ? 1 : 0);
    this.lineNumber = line.number + 1;
  }

  public failAt(
    line: SourceLine,
    index: number,
    kind: MetadataFailureKind,
    reason: string,
    cause?: unknown,
  ): AppError {
    const column = index + 1;
    return AppError.invalidMetadata(
      kind,
      `${reason} at line ${line.number}, column ${column}: \`${line.text}\``,
      { line: line.number, column, fragment: line.text },
      cause,
    );
  }

  public failAtEnd(reason: string): AppError {
    return AppError.invalidMetadata('grammar', `${reason} at line ${this.lineNumber}: end of input`, {
      line: this.lineNumber,
      column: 1,
      fragment: '',
    });
  }

  /** Line and column of an absolute offset into the input. */
  public locate(offset: number): { line: number; column: number } {
    const before = this.input.slice(0, offset);
    const lastNewline = before.lastIndexOf('\n');
    let line = 1;
    for (const char of before) {
      if (char === '\n') {
        line += 1;
      }
    }

    return { line, column: offset - lastNewline };
  }
}
