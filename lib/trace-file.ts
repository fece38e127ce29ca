/*
A TraceFile is used for debug output. Writes to the file are batched for
efficiency, but if the global `TraceFile.flushAll` _property_ is accessed, the
getter performs a flush synchronously.

To use this module as intended, add `TraceFile.flushAll` as a watch in the
debugger. Then any time the debugger steps or hits a breakpoint, the contents of
all the TraceFiles will be flushed to disk (e.g. to be visible in the IDE if
they're open).
*/
import fs from 'fs-extra';
import path from 'path';

export type LazyString = () => string;

export class TraceFile {
  static all = new Set<TraceFile>();
  private buffer = new Array<string>();
  private filename: string;
  private nextFlushThreshold: number;

  // Hint: add `TraceFile.flushAll` to the debug watch list to automatically flush on breakpoints
  public static get flushAll() {
    for (const file of TraceFile.all) {
      file.flush();
    }
    return new Date().toString();
  }

  constructor(
    filename: string,
    private automaticFlushDelayMs: number = 1000
  ) {
    TraceFile.all.add(this);
    this.filename = path.resolve(filename);
    fs.ensureDirSync(path.dirname(this.filename));
    // Wipe file
    fs.writeFileSync(this.filename, '');
    this.nextFlushThreshold = Date.now() + this.automaticFlushDelayMs;
  }

  dispose() {
    this.flush();
    TraceFile.all.delete(this);
  }

  flush() {
    if (this.buffer.length === 0) {
      return;
    }
    const toFlush = this.buffer;
    this.buffer = [];
    fs.appendFileSync(this.filename, toFlush.join(''));
    this.nextFlushThreshold = Date.now() + this.automaticFlushDelayMs;
  }

  private checkFlush() {
    if (Date.now() >= this.nextFlushThreshold) {
      this.flush();
    }
  }

  // Append content to the file
  write(content: string): void {
    this.buffer.push(content);
    this.checkFlush();
  }

  // Append a line of content to the file
  writeLine(line: string) {
    this.write(line + '\n');
  }

  // Append a titled section (`content` may be a thunk)
  writeSection(title: string, content: string | LazyString) {
    const text = typeof content === 'string' ? content : content();
    this.write(`# ${title}\n\n${text}\n\n`);
  }
}
