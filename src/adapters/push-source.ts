import { EventEmitter } from 'eventemitter3';
import type { ClipboardMonitor, SmsInbox, Unsubscribe } from './types.js';
import type { SmsMessage } from '../sync/types.js';

interface PushEvents {
  sms: [message: SmsMessage];
  clipboard: [text: string];
}

/**
 * In-memory SMS inbox and clipboard monitor. Whoever holds it pushes items
 * in; subscribed pipelines receive them synchronously.
 */
export class PushSource implements SmsInbox, ClipboardMonitor {
  private emitter = new EventEmitter<PushEvents>();

  onMessage(listener: (message: SmsMessage) => void): Unsubscribe {
    this.emitter.on('sms', listener);
    return () => {
      this.emitter.off('sms', listener);
    };
  }

  onChange(listener: (text: string) => void): Unsubscribe {
    this.emitter.on('clipboard', listener);
    return () => {
      this.emitter.off('clipboard', listener);
    };
  }

  pushSms(sender: string, content: string): void {
    this.emitter.emit('sms', { sender, content });
  }

  pushClipboard(text: string): void {
    this.emitter.emit('clipboard', text);
  }

  subscriberCount(): number {
    return this.emitter.listenerCount('sms') + this.emitter.listenerCount('clipboard');
  }
}
