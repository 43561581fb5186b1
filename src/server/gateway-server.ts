import { once } from "node:events";
import type { AddressInfo } from "node:net";
import WebSocket, { WebSocketServer } from "ws";
import type { Logger } from "pino";
import type { ResolvedServerConfig, SessionConnection } from "../types.js";
import type { SessionManager } from "../session/session-manager.js";
import { createLogger } from "../logger.js";

export interface VoiceGatewayServerOptions {
  config: ResolvedServerConfig;
  manager: SessionManager;
  logger?: Logger;
}

/**
 * WebSocket front end. One connection is one session: text messages are
 * protocol JSON, binary messages are raw 16kHz mono PCM.
 */
export class VoiceGatewayServer {
  private wss: WebSocketServer | null = null;
  private readonly config: ResolvedServerConfig;
  private readonly manager: SessionManager;
  private readonly logger: Logger;

  constructor(options: VoiceGatewayServerOptions) {
    this.config = options.config;
    this.manager = options.manager;
    this.logger = options.logger ?? createLogger({ component: "server" });
  }

  /** Bind and start accepting sessions. Port 0 picks a free port. */
  async listen(): Promise<AddressInfo> {
    if (this.wss) throw new Error("Voice gateway server is already listening");

    const wss = new WebSocketServer({
      host: this.config.host,
      port: this.config.port,
      path: this.config.path,
      maxPayload: this.config.maxPayloadBytes,
    });
    this.wss = wss;

    wss.on("connection", (socket, request) => {
      this.handleConnection(socket, request.socket.remoteAddress ?? "unknown");
    });

    try {
      await once(wss, "listening");
    } catch (err) {
      this.wss = null;
      throw err;
    }

    wss.on("error", (err) => this.logger.error({ err }, "WebSocket server error"));
    this.manager.start();

    const address = wss.address();
    if (typeof address === "string") {
      throw new Error(`Unexpected pipe address ${address}`);
    }
    this.logger.info({ host: address.address, port: address.port, path: this.config.path }, "Listening");
    return address;
  }

  /** End every session, then stop the server. */
  async close(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;

    await this.manager.stopAll();
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
    this.logger.info("Server closed");
  }

  private handleConnection(socket: WebSocket, remoteAddress: string): void {
    const connection: SessionConnection = {
      remoteAddress,
      send: (data) => {
        if (socket.readyState === WebSocket.OPEN) socket.send(data);
      },
      close: (code, reason) => {
        if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
          socket.close(code, reason);
        }
      },
    };

    const session = this.manager.startSession(connection);

    socket.on("message", (data, isBinary) => {
      this.manager.handleMessage(session, toBuffer(data), isBinary).catch((err: unknown) => {
        session.logger.error({ err }, "Unhandled error in message handler");
      });
    });

    socket.on("close", () => {
      this.manager.endSession(session, "client_closed");
    });

    socket.on("error", (err) => {
      session.logger.warn({ err }, "Connection error");
      this.manager.endSession(session, "connection_error");
    });
  }
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
