import type { ToolOutcome } from "@pharmacy-agent/core";

/** Minimal writable surface; process.stdout and test buffers both fit. */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface OutputFormatterOptions {
  color?: boolean | undefined;
  stdout?: TextSink | undefined;
  stderr?: TextSink | undefined;
}

/**
 * OutputFormatter handles all terminal output for the chat REPL: streamed
 * assistant text, tool call notices, errors and status lines.
 */
export class OutputFormatter {
  private readonly useColor: boolean;
  private readonly stdout: TextSink;
  private readonly stderr: TextSink;
  private midLine = false;

  constructor(options: OutputFormatterOptions = {}) {
    this.useColor = options.color ?? process.stdout.isTTY;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  /**
   * Write a streaming delta without newline.
   */
  delta(text: string): void {
    this.stdout.write(text);
    this.midLine = !text.endsWith("\n");
  }

  /**
   * Finalize the output after streaming (add trailing newline if needed).
   */
  endStream(): void {
    if (this.midLine) {
      this.stdout.write("\n");
      this.midLine = false;
    }
  }

  toolCall(name: string, input: unknown, outcome: ToolOutcome): void {
    this.endStream();
    const args = JSON.stringify(input);
    if (outcome.status === "ok") {
      this.line(this.stdout, `[tool] ${name}(${args})`, 33);
    } else {
      this.line(this.stdout, `[tool ${outcome.status}] ${name}(${args}): ${outcome.error}`, 31);
    }
  }

  error(message: string): void {
    this.endStream();
    this.line(this.stderr, `[error] ${message}`, 31);
  }

  warn(message: string): void {
    this.endStream();
    this.line(this.stderr, `[warn] ${message}`, 33);
  }

  info(message: string): void {
    this.line(this.stdout, message, 90);
  }

  prompt(label: string): void {
    this.stdout.write(this.useColor ? `\x1b[32m${label}> \x1b[0m` : `${label}> `);
  }

  separator(): void {
    this.stdout.write("─".repeat(60) + "\n");
  }

  private line(sink: TextSink, text: string, colorCode: number): void {
    sink.write(this.useColor ? `\x1b[${colorCode}m${text}\x1b[0m\n` : `${text}\n`);
  }
}
