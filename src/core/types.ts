import { z } from 'zod';
import type { ReceivedItem } from '../receiver/types.js';
import type { DispatchOutcome, Endpoint, EndpointOrigin, SourceKind } from '../sync/types.js';

// ===== Configuration =====

export const LanRelayConfigSchema = z.object({
  endpoint: z.object({
    host: z.string().min(1).default('192.168.1.4'),
    port: z.number().int().min(1).max(65535).default(3000),
    pathTemplate: z.string().startsWith('/').default('/upload'),
  }).default({}),
  discovery: z.object({
    enabled: z.boolean().default(true),
    serviceType: z.string().min(1).default('_photosync._tcp'),
  }).default({}),
  pipeline: z.object({
    debounceMs: z.number().int().min(0).default(500),
    dedupWindowMs: z.number().int().min(1).default(5000),
    dedupHighWaterMark: z.number().int().min(1).default(100),
  }).default({}),
  dispatch: z.object({
    timeoutMs: z.number().int().min(1).default(30000),
  }).default({}),
  photos: z.object({
    watchDir: z.string().optional(),
  }).default({}),
  receiver: z.object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(3000),
    /** Where received photos and messages are written; default <tmpdir>/lanrelay */
    outDir: z.string().optional(),
    maxBodyBytes: z.number().int().min(1).default(50 * 1024 * 1024),
    advertise: z.boolean().default(true),
    /** mDNS instance name; default <hostname>_lanrelay */
    instanceName: z.string().min(1).optional(),
  }).default({}),
  logging: z.object({
    verbose: z.boolean().default(false),
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }).default({}),
});

export type LanRelayConfig = z.infer<typeof LanRelayConfigSchema>;

/** Deep-partial shape accepted by ConfigManager.load() overrides */
export type LanRelayConfigInput = z.input<typeof LanRelayConfigSchema>;

// ===== Events =====

export type AgentState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface LanRelayEvents {
  'agent:started': { timestamp: number; sources: SourceKind[] };
  'agent:stopped': { timestamp: number };
  'endpoint:changed': { endpoint: Endpoint; origin: EndpointOrigin; url: string };
  'dispatch:completed': DispatchOutcome;
  'receiver:listening': { url: string; port: number };
  'receiver:item': ReceivedItem;
  'receiver:rejected': { path: string; status: number; reason: string };
  'advertiser:up': { name: string; serviceType: string; port: number };
  'advertiser:failed': { error: Error };
}
