import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import { WebSocket, WebSocketServer } from "ws";
import { silentLogger, type Logger } from "../warn";
import { LIVE_RELOAD_ENDPOINT, encodeReloadEvent, type ReloadEvent } from "./messages";

/**
 * Fans reload events out to connected browsers. Delivery is at most once:
 * a socket that is not open when an event is emitted never sees it.
 */
export class ReloadCoordinator {
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly clients = new Set<WebSocket>();
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
    this.wss.on("connection", (ws) => this.add(ws));
  }

  get size(): number {
    return this.clients.size;
  }

  /** Take over WebSocket upgrades on the live-reload endpoint of `server` */
  attach(server: Server): void {
    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
      if (pathname !== LIVE_RELOAD_ENDPOINT) {
        socket.destroy();
        return;
      }
      this.wss.handleUpgrade(req, socket, head, (ws) => {
        this.wss.emit("connection", ws, req);
      });
    });
  }

  private add(ws: WebSocket): void {
    this.clients.add(ws);
    ws.on("close", () => this.clients.delete(ws));
    ws.on("error", (err) => {
      this.logger.debug(`live reload socket error: ${err.message}`);
      this.clients.delete(ws);
    });
  }

  /** Send `event` to every open socket; returns how many were sent to */
  broadcast(event: ReloadEvent): number {
    const frame = encodeReloadEvent(event);
    let sent = 0;
    for (const ws of Array.from(this.clients)) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      sent += 1;
      ws.send(frame, (err) => {
        if (!err) return;
        this.logger.debug(`dropping live reload socket: ${err.message}`);
        this.clients.delete(ws);
        ws.terminate();
      });
    }
    return sent;
  }

  async close(): Promise<void> {
    for (const ws of this.clients) ws.terminate();
    this.clients.clear();
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
