/**
 * Terminal prompts (readline)
 *
 * Secret input is read in raw mode and echoed as "*".
 */

import * as readline from "readline";

export interface Prompter {
  ask(question: string): Promise<string>;
  askSecret(question: string): Promise<string>;
  /** Block until the user presses Enter */
  pause(message: string): Promise<void>;
}

const CTRL_C = "\u0003";
const CTRL_D = "\u0004";
const BACKSPACE = ["\u0008", "\u007f"];

export class TerminalPrompter implements Prompter {
  constructor(
    private readonly input: NodeJS.ReadStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout,
  ) {}

  async ask(question: string): Promise<string> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    try {
      const answer = await new Promise<string>((resolve) => rl.question(question, resolve));
      return answer.trim();
    } finally {
      rl.close();
    }
  }

  async askSecret(question: string): Promise<string> {
    // piped stdin: no raw mode, read a plain line
    if (!this.input.isTTY) {
      return this.ask(question);
    }

    this.output.write(question);
    this.input.setRawMode(true);
    this.input.resume();
    this.input.setEncoding("utf8");

    return new Promise<string>((resolve, reject) => {
      let secret = "";

      const finish = (error?: Error) => {
        this.input.setRawMode(false);
        this.input.pause();
        this.input.removeListener("data", onData);
        this.output.write("\n");
        if (error) reject(error);
        else resolve(secret.trim());
      };

      const onData = (chunk: string) => {
        for (const char of chunk) {
          if (char === "\r" || char === "\n" || char === CTRL_D) {
            finish();
            return;
          }
          if (char === CTRL_C) {
            finish(new Error("Input cancelled"));
            return;
          }
          if (BACKSPACE.includes(char)) {
            if (secret.length > 0) {
              secret = secret.slice(0, -1);
              this.output.write("\b \b");
            }
            continue;
          }
          secret += char;
          this.output.write("*");
        }
      };

      this.input.on("data", onData);
    });
  }

  async pause(message: string): Promise<void> {
    await this.ask(message);
  }
}
