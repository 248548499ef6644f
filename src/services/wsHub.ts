/** The part of a `ws` socket the hub relies on. */
export type HubSocket = {
  readonly readyState: number;
  send(message: string): void;
  on(event: 'close', listener: () => void): unknown;
};

const OPEN = 1;

export class WsHub {
  private readonly clients = new Set<HubSocket>();

  add(socket: HubSocket): void {
    this.clients.add(socket);
    socket.on('close', () => {
      this.clients.delete(socket);
    });
  }

  get size(): number {
    return this.clients.size;
  }

  broadcast(event: string, payload: unknown): void {
    if (this.clients.size === 0) {
      return;
    }

    const message = JSON.stringify({ event, payload, ts: Date.now() });
    for (const socket of this.clients) {
      if (socket.readyState === OPEN) {
        socket.send(message);
      }
    }
  }
}
