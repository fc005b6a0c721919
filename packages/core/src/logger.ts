type Namespace = 'Read' | 'Crop' | 'Fit' | 'Pipeline' | 'Tool' | 'Cli';

export interface Logger {
  info(msg: string): void;
  error(msg: string, err?: unknown): void;
}

export interface LoggerOptions {
  /** Progress messages are dropped unless set; errors always print */
  readonly verbose?: boolean;
}

export function createLogger(namespace: Namespace, options: LoggerOptions = {}): Logger {
  const prefix = `[Trimfit:${namespace}]`;
  return {
    info: (msg: string) => {
      if (options.verbose) console.debug(`${prefix} ${msg}`);
    },
    error: (msg: string, err?: unknown) =>
      err ? console.error(`${prefix} ${msg}`, err) : console.error(`${prefix} ${msg}`),
  };
}
