import type { Candidate, SignalResolver } from '../orchestrator.js';
import type { SmsRecord, SmsSignal } from '../types.js';

const CODE_PATTERN = /(?<!\d)\d{4,6}(?!\d)/;

/**
 * First standalone run of 4 to 6 digits, the usual shape of a one-time code.
 * Empty string when there is none.
 */
export function extractVerificationCode(content: string): string {
  return CODE_PATTERN.exec(content)?.[0] ?? '';
}

export function toSmsRecord(sender: string, content: string): SmsRecord {
  return {
    sender: sender.trim() || 'Unknown',
    content,
    code: extractVerificationCode(content),
  };
}

export class SmsResolver implements SignalResolver<SmsSignal> {
  readonly kind = 'sms' as const;

  async locate(signal: SmsSignal): Promise<Candidate | null> {
    const record = toSmsRecord(signal.message.sender, signal.message.content);
    return {
      label: `sms from ${record.sender}`,
      load: async () => ({ contentKind: 'json', payload: record, pathSuffix: '/sms' }),
    };
  }
}
