import { OutputCallback, StreamName } from '../types/index.js';

export const defaultPrinter: OutputCallback = (line, stream) => {
  process.stdout.write(`[${stream}] ${line}`);
};

/**
 * Frames a text stream into lines regardless of chunk boundaries. Complete
 * lines (terminator attached) go to the callback, if any, and are always
 * accumulated; an unterminated tail is held until more text or `flush()`.
 */
export class LineEmitter {
  private parts: string[] = [];
  private tail = '';

  constructor(
    private readonly callback: OutputCallback | undefined,
    private readonly stream: StreamName
  ) {}

  feed(chunk: string): void {
    if (!chunk) {
      return;
    }

    const lines = splitLines(this.tail + chunk);
    const last = lines[lines.length - 1];
    const incomplete = last !== undefined && !endsWithTerminator(last);
    this.tail = incomplete ? last : '';

    const complete = incomplete ? lines.slice(0, -1) : lines;
    for (const line of complete) {
      this.emit(line);
    }
  }

  flush(): void {
    if (this.tail) {
      const line = this.tail;
      this.tail = '';
      this.emit(line);
    }
  }

  collected(): string {
    return this.parts.join('');
  }

  private emit(line: string): void {
    this.callback?.(line, this.stream);
    this.parts.push(line);
  }
}

// "\r\n" stays one terminator; a lone "\r" at the end may still become one,
// so it is not treated as terminated until the next character is known.
function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\n') {
      lines.push(text.slice(start, i + 1));
      start = i + 1;
    } else if (ch === '\r' && i + 1 < text.length) {
      if (text[i + 1] === '\n') {
        continue;
      }
      lines.push(text.slice(start, i + 1));
      start = i + 1;
    }
  }

  if (start < text.length) {
    lines.push(text.slice(start));
  }
  return lines;
}

function endsWithTerminator(line: string): boolean {
  return line.endsWith('\n');
}
