/**
 * Shared bonjour-service construction for browsing and advertising.
 */

import { Bonjour } from 'bonjour-service';

interface ErrorEmitter {
  on(event: 'error', listener: (err: Error) => void): unknown;
}

function isErrorEmitter(value: unknown): value is ErrorEmitter {
  return typeof value === 'object' && value !== null && 'on' in value && typeof value.on === 'function';
}

/**
 * Open a bonjour-service instance whose socket failures reach `onError`.
 *
 * multicast-dns emits 'error' on EADDRINUSE/EACCES, and bonjour-service
 * leaves that emitter without a listener. The socket lives at
 * `bonjour.server.mdns`, which the package does not type.
 */
export function openBonjour(onError: (err: Error) => void): Bonjour {
  const bonjour = new Bonjour({}, onError);
  const server: unknown = Reflect.get(bonjour, 'server');
  const mdns: unknown = typeof server === 'object' && server !== null ? Reflect.get(server, 'mdns') : undefined;
  if (isErrorEmitter(mdns)) {
    mdns.on('error', onError);
  }
  return bonjour;
}
