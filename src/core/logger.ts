export interface Logger {
  debug(message: string, ...attributes: unknown[]): void;
  info(message: string, ...attributes: unknown[]): void;
  warn(message: string, ...attributes: unknown[]): void;
  error(message: string, ...attributes: unknown[]): void;
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export class ConsoleLogger implements Logger {
  private readonly context: string | undefined;

  constructor(context?: string) {
    this.context = context;
  }

  debug(message: string, ...attributes: unknown[]): void {
    if (this.context) console.debug(this.context, message, ...attributes);
    else console.debug(message, ...attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    if (this.context) console.info(this.context, message, ...attributes);
    else console.info(message, ...attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    if (this.context) console.warn(this.context, message, ...attributes);
    else console.warn(message, ...attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    if (this.context) console.error(this.context, message, ...attributes);
    else console.error(message, ...attributes);
  }
}
