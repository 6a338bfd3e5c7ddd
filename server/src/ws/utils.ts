/** The part of a ws WebSocket the channels use. */
export interface ChannelSocket {
  readonly readyState: number;
  readonly OPEN: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export const CloseCode = {
  SESSION_CLOSED: 4000,
  BAD_REQUEST: 4400,
  SESSION_BUSY: 4409,
  SETUP_FAILED: 1011,
} as const;

export function isOpen(socket: ChannelSocket): boolean {
  return socket.readyState === socket.OPEN;
}

export function send(socket: ChannelSocket, message: object): void {
  if (!isOpen(socket)) return;
  socket.send(JSON.stringify(message));
}

export function closeSocket(socket: ChannelSocket, code: number, reason: string): void {
  if (!isOpen(socket)) return;
  socket.close(code, reason);
}

export function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}
