import type { Sink } from '../../domain/ports/IFormatter.js';

/**
 * Sink that keeps every write in memory
 */
export class MemorySink implements Sink {
  private readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  /** Each write, in order. */
  get writes(): readonly string[] {
    return this.chunks;
  }

  text(): string {
    return this.chunks.join('');
  }

  /** Lines written so far without their terminators, including a trailing partial line. */
  lines(): string[] {
    const text = this.text();
    if (text === '') return [];
    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
  }

  clear(): void {
    this.chunks.length = 0;
  }
}
