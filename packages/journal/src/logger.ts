import type { Logger } from "@briefcase/schemas";

export class ConsoleLogger implements Logger {
  private prefix: string;

  constructor(scope: string) {
    // Scope names end up at the start of terminal lines; keep control chars out
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[${safeScope}]`;
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!process.env.BRIEFCASE_DEBUG) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

export function createLogger(scope: string): Logger {
  return new ConsoleLogger(scope);
}
