/**
 * Sync Pipeline Types
 *
 * Signals flowing from adapters into the debouncer, the jobs handed to the
 * upload dispatcher, and the shapes the endpoint resolver works with.
 */

// ═══════════════════════════════════════════════════════════════
// SOURCES & SIGNALS
// ═══════════════════════════════════════════════════════════════

export type SourceKind = 'photo' | 'sms' | 'clipboard';

export type ItemId = number | string;

export interface SmsMessage {
  sender: string;
  content: string;
}

export interface PhotoSignal {
  source: 'photo';
  /** Reference to the changed item, when the adapter knows it */
  itemRef?: string;
  arrivalTime: number;
}

export interface SmsSignal {
  source: 'sms';
  message: SmsMessage;
  arrivalTime: number;
}

export interface ClipboardSignal {
  source: 'clipboard';
  text: string;
  arrivalTime: number;
}

export type ChangeSignal = PhotoSignal | SmsSignal | ClipboardSignal;

// ═══════════════════════════════════════════════════════════════
// UPLOAD JOBS
// ═══════════════════════════════════════════════════════════════

export interface SmsRecord {
  sender: string;
  content: string;
  code: string;
}

export interface ClipboardRecord {
  text: string;
  timestamp: number;
}

export interface BinaryUploadJob {
  id: string;
  source: SourceKind;
  contentKind: 'raw-binary';
  payload: Uint8Array;
  fileName: string;
  pathSuffix: '/upload';
  createdAt: number;
}

export interface JsonUploadJob {
  id: string;
  source: SourceKind;
  contentKind: 'json';
  payload: SmsRecord | ClipboardRecord;
  pathSuffix: '/sms' | '/clipboard';
  createdAt: number;
}

export type UploadJob = BinaryUploadJob | JsonUploadJob;

/** A job before the orchestrator stamps it with an id and timestamp */
export type UploadJobDraft =
  | Omit<BinaryUploadJob, 'id' | 'source' | 'createdAt'>
  | Omit<JsonUploadJob, 'id' | 'source' | 'createdAt'>;

export type DispatchStatus = 'delivered' | 'rejected' | 'failed' | 'dropped';

export interface DispatchOutcome {
  jobId: string;
  source: SourceKind;
  /** Target URL, or null when the job was dropped for lack of an endpoint */
  url: string | null;
  status: DispatchStatus;
  httpStatus?: number;
  error?: Error;
  durationMs: number;
}

export type DispatchSink = (outcome: DispatchOutcome) => void;

// ═══════════════════════════════════════════════════════════════
// ENDPOINT & DISCOVERY
// ═══════════════════════════════════════════════════════════════

export interface Endpoint {
  host: string;
  port: number;
  pathTemplate: string;
}

export type EndpointOrigin = 'default' | 'discovery' | 'manual';

export interface EndpointChange {
  endpoint: Endpoint;
  origin: EndpointOrigin;
}

export type ResolverState =
  | 'unresolved'
  | 'default-set'
  | 'discovering'
  | 'resolved'
  | 'manual-override';

export type SessionState = 'idle' | 'starting' | 'browsing' | 'stopping' | 'stopped' | 'failed';

export interface ServiceDescriptor {
  serviceName: string;
  serviceType: string;
  host?: string;
  port?: number;
  addresses?: string[];
}

export interface DiscoverySession {
  /** Listener identity; results tagged with another id are stale */
  id: string;
  serviceType: string;
  state: SessionState;
}

export interface ManualEndpointUpdate {
  ip: string;
  /** Default: 3000 */
  port?: number;
}
