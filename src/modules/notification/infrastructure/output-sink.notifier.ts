import type { Notifier } from '../../../shared/ports/notifier.port';
import type { OutputSink } from '../../../shared/ports/output-sink.port';
import { DeliveryError } from '../../../shared/domain/errors';
import { DONE, fail, type Result } from '../../../shared/domain/result';

/**
 * Base for notifiers whose delivery is a single line on an OutputSink.
 * Subclasses only pick the channel; the result contract is shared.
 */
export abstract class OutputSinkNotifier implements Notifier {
  abstract readonly channel: string;

  protected constructor(private readonly sink: OutputSink) {}

  send(message: string): Result<void, DeliveryError> {
    if (!this.sink.isAvailable()) {
      return fail(new DeliveryError('sink unavailable', this.channel));
    }

    try {
      this.sink.writeLine(`Sending ${this.channel}: ${message}`);
    } catch (error) {
      return fail(
        new DeliveryError(
          error instanceof Error ? error.message : String(error),
          this.channel,
        ),
      );
    }

    return DONE;
  }
}
