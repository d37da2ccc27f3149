import { StringDecoder } from 'node:string_decoder';
import type { OutputStream } from './command-runner';

/**
 * Turns one child stream's raw chunks into text and complete lines.
 * A UTF-8 sequence or a line may straddle chunks; both are held until complete.
 */
export class OutputLineSplitter {
  private readonly decoder = new StringDecoder('utf8');
  private partial = '';

  constructor(
    readonly stream: OutputStream,
    private readonly onLine: (line: string, stream: OutputStream) => void,
  ) {}

  /** Returns the text decoded from this chunk */
  push(chunk: Buffer): string {
    const text = this.decoder.write(chunk);
    this.emitLines(text);
    return text;
  }

  /** Returns whatever the decoder still held; emits the unterminated last line */
  end(): string {
    const rest = this.decoder.end();
    this.emitLines(rest);
    if (this.partial.length > 0) this.onLine(this.partial, this.stream);
    this.partial = '';
    return rest;
  }

  private emitLines(text: string): void {
    if (text.length === 0) return;
    const pieces = (this.partial + text).split(/\r?\n/);
    this.partial = pieces.pop() ?? '';
    for (const line of pieces) this.onLine(line, this.stream);
  }
}
