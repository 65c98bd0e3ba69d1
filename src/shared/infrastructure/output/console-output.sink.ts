import { Injectable } from '@nestjs/common';
import type { OutputSink } from '../../ports/output-sink.port';

/**
 * Writes notification lines to the process standard output.
 */
@Injectable()
export class ConsoleOutputSink implements OutputSink {
  isAvailable(): boolean {
    return process.stdout.writable;
  }

  writeLine(line: string): void {
    process.stdout.write(`${line}\n`);
  }
}
