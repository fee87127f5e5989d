import { Interface, createInterface } from 'readline';
import { Writable } from 'stream';
import { ErrorFactory } from './errors.js';
import { Prompter } from './types.js';

interface PendingAnswer {
  resolve(line: string): void;
  reject(error: Error): void;
}

/**
 * Reads answers from the controlling terminal. Secret answers are read with
 * echo suppressed; only the question itself reaches the screen.
 *
 * One readline interface serves every question until `close()`. Lines that
 * arrive before they are asked for (piped or pasted answers) wait in a queue
 * and answer the next questions in order.
 */
export class TerminalPrompter implements Prompter {
  private muted = false;
  private readonly output: Writable;
  private rl?: Interface;
  private readonly lines: string[] = [];
  private pending?: PendingAnswer;
  private inputEnded = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly screen: NodeJS.WritableStream = process.stdout
  ) {
    this.output = new Writable({
      write: (chunk, encoding, callback) => {
        if (!this.muted) {
          this.screen.write(chunk, encoding);
        }
        callback();
      }
    });
  }

  say(message: string): void {
    this.screen.write(`${message}\n`);
  }

  async ask(question: string): Promise<string> {
    const answer = await this.question(question, false);
    return answer.trim();
  }

  askSecret(question: string): Promise<string> {
    return this.question(question, true);
  }

  close(): void {
    const rl = this.rl;
    this.rl = undefined;
    rl?.close();
  }

  private open(): Interface {
    if (this.rl) {
      return this.rl;
    }

    const rl = createInterface({ input: this.input, output: this.output, terminal: true });
    rl.on('line', (line) => this.receive(line));
    rl.on('close', () => {
      if (this.rl === rl) {
        // closed by the input running out, not by close()
        this.rl = undefined;
        this.inputEnded = true;
      }
      this.muted = false;
      const pending = this.pending;
      this.pending = undefined;
      pending?.reject(ErrorFactory.inputClosed());
    });
    this.rl = rl;
    return rl;
  }

  private question(query: string, secret: boolean): Promise<string> {
    const queued = this.lines.shift();
    if (queued !== undefined) {
      this.screen.write(`${query}\n`);
      return Promise.resolve(queued);
    }
    if (this.inputEnded) {
      return Promise.reject(ErrorFactory.inputClosed());
    }

    const rl = this.open();
    return new Promise((resolve, reject) => {
      this.pending = {
        resolve: (line) => {
          if (secret) {
            this.screen.write('\n');
          }
          resolve(line);
        },
        reject
      };
      rl.setPrompt(query);
      rl.prompt();
      // prompt() writes the query synchronously, so muting here hides only the typed answer
      this.muted = secret;
    });
  }

  private receive(line: string): void {
    this.muted = false;
    const pending = this.pending;
    if (!pending) {
      this.lines.push(line);
      return;
    }
    this.pending = undefined;
    this.rl?.setPrompt('');
    pending.resolve(line);
  }
}
