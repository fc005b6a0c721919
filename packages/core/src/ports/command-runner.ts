export interface CommandResult {
  readonly exitCode: number;
  /** Set when the process was killed by a signal */
  readonly signal?: string;
  readonly stdout: string;
  readonly stderr: string;
}

export interface CommandRunnerPort {
  /** Runs to completion; rejects with ExternalToolError when the process cannot start */
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}
