/**
 * Channel Addresses
 *
 * The gateway names its endpoints with `ipc://<path>` URLs (Unix domain
 * sockets). TCP endpoints may be given as plain ws:// or wss:// URLs.
 */

import { TransportError } from '../errors/bridge-error.js';

export const IPC_SCHEME = 'ipc://';

/**
 * Address of the persistent channel handed out by the handshake reply
 */
export function deriveChannelAddress(baseUrl: string, ipcBaseAddr: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  return `${base}/${ipcBaseAddr}`;
}

/**
 * Socket path of an ipc:// address
 */
export function ipcSocketPath(address: string): string {
  if (!address.startsWith(IPC_SCHEME)) {
    throw new TransportError(`Not an ipc address: ${address}`, address, { code: 'UNSUPPORTED_ADDRESS' });
  }
  const socketPath = address.slice(IPC_SCHEME.length);
  if (socketPath.length === 0) {
    throw new TransportError(`Empty ipc socket path: ${address}`, address, { code: 'UNSUPPORTED_ADDRESS' });
  }
  return socketPath;
}

/**
 * Translate a channel address to the URL form the ws client dials
 */
export function toWebSocketUrl(address: string): string {
  if (address.startsWith(IPC_SCHEME)) {
    // ws separates the socket path from the request path with ':'
    return `ws+unix://${ipcSocketPath(address)}:/`;
  }
  if (address.startsWith('ws://') || address.startsWith('wss://') || address.startsWith('ws+unix://')) {
    return address;
  }
  throw new TransportError(`Unsupported channel address: ${address}`, address, { code: 'UNSUPPORTED_ADDRESS' });
}
