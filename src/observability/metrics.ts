/**
 * Parsing metrics collected over a single parse call.
 *
 * A metrics object belongs to one parser instance and is reset at the start
 * of every parse entry point; nothing here is shared between instances.
 */

export class ParsingMetrics {
  /** Milliseconds spent in the lexer */
  tokenizationMs = 0;
  /** Milliseconds spent building the tree */
  parsingMs = 0;
  /** Milliseconds spent reading, decoding and expanding includes */
  fileIoMs = 0;
  tokensProcessed = 0;
  linesProcessed = 0;
  /** UTF-8 byte length of the text handed to the lexer */
  inputSizeBytes = 0;
  heapBefore = 0;
  heapAfter = 0;
  errorCount = 0;
  warningCount = 0;

  readonly customTimings = new Map<string, number>();
  readonly counters = new Map<string, number>();

  get totalParsingMs(): number {
    return this.tokenizationMs + this.parsingMs;
  }

  get totalMs(): number {
    return this.tokenizationMs + this.parsingMs + this.fileIoMs;
  }

  get tokensPerSecond(): number {
    return this.tokensProcessed / Math.max(this.totalParsingMs / 1000, 0.001);
  }

  get bytesPerSecond(): number {
    return this.inputSizeBytes / Math.max(this.totalMs / 1000, 0.001);
  }

  get heapDelta(): number {
    return this.heapAfter - this.heapBefore;
  }

  reset(): void {
    this.tokenizationMs = 0;
    this.parsingMs = 0;
    this.fileIoMs = 0;
    this.tokensProcessed = 0;
    this.linesProcessed = 0;
    this.inputSizeBytes = 0;
    this.heapBefore = 0;
    this.heapAfter = 0;
    this.errorCount = 0;
    this.warningCount = 0;
    this.customTimings.clear();
    this.counters.clear();
  }

  recordTiming(name: string, ms: number): void {
    this.customTimings.set(name, ms);
  }

  increment(counter: string, by = 1): void {
    this.counters.set(counter, (this.counters.get(counter) ?? 0) + by);
  }

  toString(): string {
    return (
      `Parsing Metrics: Total Time: ${this.totalMs.toFixed(1)}ms, ` +
      `Tokens: ${this.tokensProcessed}, ` +
      `Throughput: ${this.tokensPerSecond.toFixed(0)} tokens/sec, ` +
      `Errors: ${this.errorCount}, ` +
      `Warnings: ${this.warningCount}`
    );
  }

  toDetailedString(): string {
    const lines = [
      '=== Parsing Performance Metrics ===',
      `Total Time: ${this.totalMs.toFixed(1)}ms`,
      `  - File I/O: ${this.fileIoMs.toFixed(1)}ms`,
      `  - Tokenization: ${this.tokenizationMs.toFixed(1)}ms`,
      `  - Parsing: ${this.parsingMs.toFixed(1)}ms`,
      `Input Size: ${this.inputSizeBytes} bytes`,
      `Tokens Processed: ${this.tokensProcessed}`,
      `Lines Processed: ${this.linesProcessed}`,
      `Throughput: ${this.tokensPerSecond.toFixed(0)} tokens/sec, ${(this.bytesPerSecond / 1024).toFixed(1)} KB/sec`,
      `Heap Delta: ${(this.heapDelta / 1024).toFixed(1)} KB`,
      `Errors: ${this.errorCount}, Warnings: ${this.warningCount}`,
    ];

    if (this.customTimings.size > 0) {
      lines.push('Custom Timings:');
      for (const [name, ms] of this.customTimings) {
        lines.push(`  - ${name}: ${ms.toFixed(1)}ms`);
      }
    }

    if (this.counters.size > 0) {
      lines.push('Counters:');
      for (const [name, count] of this.counters) {
        lines.push(`  - ${name}: ${count}`);
      }
    }

    return lines.join('\n');
  }
}
