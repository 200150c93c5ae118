import { Injectable, Logger } from '@nestjs/common';
import { Readable, Writable } from 'node:stream';
import { OrderProcessorService } from '../trade-book/order-processor.service';
import { batchLines, interactiveLines } from './line-sources';

const EXIT_COMMAND = 'exit';

export interface RunSummary {
  processed: number;
  accepted: number;
  rejected: number;
}

// Feeds a sequence of lines through the order processor, one at a time,
// writing one status line per order. Both input modes end up here.
@Injectable()
export class OrderRunnerService {
  private readonly logger = new Logger(OrderRunnerService.name);

  constructor(private readonly processor: OrderProcessorService) {}

  /** Prompt loop; `exit` or end of input ends the session */
  runInteractive(input: Readable, output: Writable): Promise<RunSummary> {
    return this.run(interactiveLines(input, output), output, true);
  }

  /** Processes every line of the file, in order */
  runBatch(filePath: string, output: Writable): Promise<RunSummary> {
    return this.run(batchLines(filePath), output, false);
  }

  async run(lines: AsyncIterable<string>, output: Writable, stopOnExit: boolean): Promise<RunSummary> {
    const summary: RunSummary = { processed: 0, accepted: 0, rejected: 0 };

    for await (const line of lines) {
      const command = line.trim();
      if (!command) {
        continue;
      }
      if (stopOnExit && command.toLowerCase() === EXIT_COMMAND) {
        break;
      }

      const outcome = await this.processor.submit(command);
      summary.processed++;
      if (outcome.accepted) {
        summary.accepted++;
      } else {
        summary.rejected++;
      }
      output.write(`${outcome.message}\n`);
    }

    this.logger.log(
      `Processed ${summary.processed} orders (${summary.accepted} accepted, ${summary.rejected} rejected)`,
    );
    return summary;
  }
}
