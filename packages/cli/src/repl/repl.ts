import * as readline from "node:readline";
import type { LoopFactory } from "@pharmacy-agent/server";
import { ChatSession } from "./chat-session.js";
import { OutputFormatter, type OutputFormatterOptions } from "./output-formatter.js";

export interface REPLOptions {
  createLoop: LoopFactory;
  agentName: string;
  version: string;
  input?: NodeJS.ReadableStream | undefined;
  output?: NodeJS.WritableStream | undefined;
  formatter?: OutputFormatterOptions | undefined;
}

const HELP = `Commands:
  /reset   Start a new conversation
  /exit    Quit
Ctrl+C cancels a reply in progress.`;

/**
 * REPL implements the readline-based terminal chat.
 *
 * Turn loop:
 *   1. Read user input
 *   2. Handle /reset, /help and /exit locally
 *   3. Send everything else, with the history, through a fresh AgentLoop
 *   4. Stream the reply to the terminal
 */
export class REPL {
  private readonly options: REPLOptions;
  private readonly formatter: OutputFormatter;
  private readonly session: ChatSession;
  private rl: readline.Interface | null = null;
  private inFlight: AbortController | null = null;

  constructor(options: REPLOptions) {
    this.options = options;
    this.formatter = new OutputFormatter(options.formatter);
    this.session = new ChatSession(options.createLoop, this.formatter);
  }

  /**
   * Start the interactive session.
   * Resolves when the user exits (/exit or end of input).
   */
  async start(): Promise<void> {
    const rl = readline.createInterface({
      input: this.options.input ?? process.stdin,
      output: this.options.output ?? process.stdout,
      terminal: this.options.input === undefined,
    });
    this.rl = rl;

    this.formatter.info(
      `pharmacy-agent v${this.options.version}. Type /help for commands, /exit to quit.`
    );
    this.formatter.info(`Agent: ${this.options.agentName}`);
    this.formatter.separator();

    await new Promise<void>((resolve) => {
      const promptUser = (): void => this.formatter.prompt("you");

      rl.on("line", (line: string) => {
        // Concurrency guard: one request at a time
        if (this.inFlight) {
          this.formatter.warn("Still answering. Press Ctrl+C to cancel.");
          return;
        }
        this.handleLine(line.trim())
          .then((keepGoing) => {
            if (keepGoing) {
              promptUser();
            } else {
              rl.close();
            }
          })
          .catch((err: unknown) => {
            this.formatter.error(err instanceof Error ? err.message : String(err));
            promptUser();
          });
      });

      rl.on("close", () => {
        this.inFlight?.abort();
        resolve();
      });

      rl.on("SIGINT", () => {
        if (this.inFlight) {
          this.inFlight.abort();
          return;
        }
        this.formatter.endStream();
        this.formatter.info("\nUse /exit to quit.");
        promptUser();
      });

      promptUser();
    });
  }

  /** Returns false when the session should end. */
  async handleLine(input: string): Promise<boolean> {
    if (!input) return true;

    if (input === "/exit" || input === "/quit") {
      this.formatter.info("Goodbye.");
      return false;
    }

    if (input === "/help") {
      this.formatter.info(HELP);
      return true;
    }

    if (input === "/reset") {
      this.session.reset();
      this.formatter.info("Conversation cleared.");
      return true;
    }

    if (input.startsWith("/")) {
      this.formatter.warn(`Unknown command "${input}". Type /help for commands.`);
      return true;
    }

    const controller = new AbortController();
    this.inFlight = controller;
    try {
      const outcome = await this.session.send(input, controller.signal);
      if (outcome === "cancelled") this.formatter.info("(cancelled)");
    } finally {
      this.inFlight = null;
    }
    return true;
  }

  close(): void {
    this.rl?.close();
  }
}
