import type { Candidate, SignalResolver } from '../orchestrator.js';
import type { ClipboardSignal } from '../types.js';

/**
 * Relays clipboard text, skipping empty text and text identical to the last
 * relayed value.
 */
export class ClipboardResolver implements SignalResolver<ClipboardSignal> {
  readonly kind = 'clipboard' as const;
  private lastSentText: string | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  async locate(signal: ClipboardSignal): Promise<Candidate | null> {
    const text = signal.text;
    if (text.length === 0 || text === this.lastSentText) {
      return null;
    }

    return {
      label: `clipboard (${text.length} chars)`,
      load: async () => ({
        contentKind: 'json',
        payload: { text, timestamp: this.now() },
        pathSuffix: '/clipboard',
      }),
      onAdmitted: () => {
        this.lastSentText = text;
      },
    };
  }

  getLastSentText(): string | null {
    return this.lastSentText;
  }
}
