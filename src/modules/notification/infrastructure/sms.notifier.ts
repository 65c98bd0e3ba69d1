import { Inject, Injectable } from '@nestjs/common';
import { OUTPUT_SINK } from '../../../shared/ports/output-sink.port';
import type { OutputSink } from '../../../shared/ports/output-sink.port';
import { OutputSinkNotifier } from './output-sink.notifier';

@Injectable()
export class SmsNotifier extends OutputSinkNotifier {
  readonly channel = 'sms';

  constructor(@Inject(OUTPUT_SINK) sink: OutputSink) {
    super(sink);
  }
}
