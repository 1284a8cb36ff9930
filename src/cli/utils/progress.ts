import ora, { type Ora } from 'ora';

/**
 * Spinner interface for progress indication.
 */
export interface Spinner {
  start(): Spinner;
  stop(): Spinner;
  succeed(message?: string): Spinner;
  fail(message?: string): Spinner;
  update(message: string): Spinner;
}

/**
 * Where progress is written. Command output owns stdout, so this is stderr
 * unless a caller passes something else.
 */
export type ProgressStream = NodeJS.WritableStream & { isTTY?: boolean };

export interface SpinnerOptions {
  stream?: ProgressStream;
  /** Write nothing at all (JSON output) */
  silent?: boolean;
}

class SilentSpinner implements Spinner {
  start(): Spinner {
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(): Spinner {
    return this;
  }

  fail(): Spinner {
    return this;
  }

  update(): Spinner {
    return this;
  }
}

/**
 * Fallback spinner for non-TTY environments (CI, pipes, etc.)
 */
class FallbackSpinner implements Spinner {
  constructor(
    private text: string,
    private readonly stream: ProgressStream
  ) {}

  start(): Spinner {
    this.stream.write(`${this.text}\n`);
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(message?: string): Spinner {
    if (message) {
      this.stream.write(`✓ ${message}\n`);
    }
    return this;
  }

  fail(message?: string): Spinner {
    if (message) {
      this.stream.write(`✗ ${message}\n`);
    }
    return this;
  }

  update(message: string): Spinner {
    this.text = message;
    this.stream.write(`${message}\n`);
    return this;
  }
}

/**
 * Wrapper for ora spinner to implement our Spinner interface.
 */
class OraSpinner implements Spinner {
  constructor(private readonly spinner: Ora) {}

  start(): Spinner {
    this.spinner.start();
    return this;
  }

  stop(): Spinner {
    this.spinner.stop();
    return this;
  }

  succeed(message?: string): Spinner {
    this.spinner.succeed(message);
    return this;
  }

  fail(message?: string): Spinner {
    this.spinner.fail(message);
    return this;
  }

  update(message: string): Spinner {
    this.spinner.text = message;
    return this;
  }
}

/**
 * Create a spinner for progress indication.
 * Uses ora on a TTY and plain lines everywhere else.
 */
export function createSpinner(text: string, options: SpinnerOptions = {}): Spinner {
  if (options.silent) {
    return new SilentSpinner();
  }

  const stream = options.stream ?? process.stderr;
  if (stream.isTTY) {
    return new OraSpinner(ora({ text, color: 'cyan', stream }));
  }

  return new FallbackSpinner(text, stream);
}
