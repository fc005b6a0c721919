export class TrimfitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrimfitError';
  }
}

export class InvalidSizeError extends TrimfitError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSizeError';
  }
}

export class ConflictingOptionsError extends TrimfitError {
  constructor(message: string) {
    super(message);
    this.name = 'ConflictingOptionsError';
  }
}

export class UnknownPaperSizeError extends TrimfitError {
  readonly paperName: string;

  constructor(paperName: string, message: string) {
    super(message);
    this.name = 'UnknownPaperSizeError';
    this.paperName = paperName;
  }
}

export class UsageError extends TrimfitError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class FileNotFoundError extends TrimfitError {
  readonly path: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super(message);
    this.name = 'FileNotFoundError';
    this.path = filePath;
    this.cause = cause;
  }
}

export class InvalidInputError extends TrimfitError {
  readonly path: string;

  constructor(filePath: string) {
    super(`Input must be a .pdf file: ${filePath}`);
    this.name = 'InvalidInputError';
    this.path = filePath;
  }
}

export class MarginTooLargeError extends TrimfitError {
  readonly margin: number;

  constructor(margin: number, width: number, height: number) {
    super(`Margin ${margin} is too large for size ${width}x${height}`);
    this.name = 'MarginTooLargeError';
    this.margin = margin;
  }
}

export class MissingToolError extends TrimfitError {
  readonly tool: string;

  constructor(tool: string, installHint: string) {
    super(`Required tool not found on PATH: ${tool}\n\n${installHint}`);
    this.name = 'MissingToolError';
    this.tool = tool;
  }
}

export interface ExternalToolFailure {
  readonly command: string;
  readonly args: readonly string[];
  /** Null when the process could not be started */
  readonly exitCode: number | null;
  readonly signal?: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly cause?: unknown;
}

export class ExternalToolError extends TrimfitError {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(failure: ExternalToolFailure) {
    super(formatToolFailure(failure));
    this.name = 'ExternalToolError';
    this.command = failure.command;
    this.args = failure.args;
    this.exitCode = failure.exitCode;
    this.stdout = failure.stdout;
    this.stderr = failure.stderr;
    this.cause = failure.cause;
  }
}

export type PdfOperation = 'load' | 'save' | 'read' | 'edit';

export class PdfIoError extends TrimfitError {
  readonly operation: PdfOperation;

  constructor(operation: PdfOperation, detail: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`PDF ${operation} failed (${detail})${reason}`);
    this.name = 'PdfIoError';
    this.operation = operation;
    this.cause = cause;
  }
}

export type FileSystemOperation = 'read' | 'write' | 'mkdir' | 'delete' | 'stat' | 'mkdtemp';

export class FileSystemError extends TrimfitError {
  readonly operation: FileSystemOperation;
  readonly path: string;

  constructor(operation: FileSystemOperation, filePath: string, cause?: unknown) {
    super(`File system ${operation} failed: ${filePath}`);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = filePath;
    this.cause = cause;
  }
}

function formatToolFailure(failure: ExternalToolFailure): string {
  let message = `Command failed:\n  ${[failure.command, ...failure.args].join(' ')}\n\n`;
  if (failure.exitCode === null) {
    const reason = failure.cause instanceof Error ? failure.cause.message : String(failure.cause);
    message += `Could not start ${failure.command}: ${reason}\n`;
  } else if (failure.signal) {
    message += `Terminated by signal ${failure.signal}\n`;
  }
  if (failure.stdout.trim()) {
    message += `STDOUT:\n${failure.stdout}\n`;
  }
  if (failure.stderr.trim()) {
    message += `STDERR:\n${failure.stderr}\n`;
  }
  return message;
}
