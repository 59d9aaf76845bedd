import type { NotificationSink } from '../../shared/types/api.js';

const HEADER = '===== Notification Digest =====';

export class ConsoleSink implements NotificationSink {
  readonly name = 'console';

  constructor(
    readonly maxLength = 10_000,
    private readonly write: (line: string) => void = (line) => console.log(line)
  ) {}

  async send(text: string): Promise<void> {
    this.write(`\n${HEADER}\n${text}\n${'='.repeat(HEADER.length)}\n`);
  }
}
