import { IncomingMessage } from 'http';

// Signature checks need the exact bytes Meta signed, not re-serialized JSON
const rawBodies = new WeakMap<IncomingMessage, Buffer>();

export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, buf);
}

export function rawBodyOf(req: IncomingMessage): Buffer | undefined {
  return rawBodies.get(req);
}
