import { createInterface, Interface } from 'readline';
import { Writable } from 'stream';
import { Prompter } from '../interfaces/Prompter';

type PromptInput = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Prompter backed by a readline interface on the terminal. Lines that arrive
 * before a question is asked are queued, so piped input answers each question
 * in turn.
 */
export class ConsolePrompter implements Prompter {
  private rl: Interface | null = null;
  private closed = false;
  private muted = false;
  private pendingLines: string[] = [];
  private waiting: ((line: string) => void) | null = null;

  constructor(
    private readonly input: PromptInput = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(question: string): Promise<string> {
    return this.question(question, false);
  }

  askSecret(question: string): Promise<string> {
    return this.question(question, true);
  }

  close(): void {
    if (this.rl && !this.closed) {
      this.rl.close();
    }
  }

  private async question(question: string, secret: boolean): Promise<string> {
    const rl = this.getInterface();
    if (this.closed && this.pendingLines.length === 0) {
      return '';
    }

    // Redraws in terminal mode repeat the prompt
    rl.setPrompt(question);
    this.output.write(question);

    this.muted = secret;
    const answer = await this.nextLine();
    this.muted = false;

    if (secret) {
      this.output.write('\n');
    }
    return answer.trim();
  }

  private nextLine(): Promise<string> {
    const buffered = this.pendingLines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.resolve('');
    }
    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }

  private getInterface(): Interface {
    if (!this.rl) {
      const output = new Writable({
        write: (chunk: Buffer, _encoding, callback) => {
          if (!this.muted) {
            this.output.write(chunk);
          }
          callback();
        },
      });

      this.rl = createInterface({
        input: this.input,
        output,
        terminal: this.input.isTTY === true,
      });
      this.rl.on('line', line => {
        const waiting = this.waiting;
        if (waiting) {
          this.waiting = null;
          waiting(line);
        } else {
          this.pendingLines.push(line);
        }
      });
      this.rl.on('close', () => {
        this.closed = true;
        const waiting = this.waiting;
        this.waiting = null;
        waiting?.('');
      });
    }
    return this.rl;
  }
}
