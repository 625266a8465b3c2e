/**
 * Preview WebSocket
 *
 * Attaches every client connected on /ws/preview to the preview feed.
 * Messages: { type: "connection" } once, then PreviewMessage frames.
 */

import { WebSocketServer, WebSocket } from "ws";
import type { FastifyInstance } from "fastify";
import { API_ENDPOINTS } from "@visionrig/config";
import { createLogger } from "@visionrig/utils";
import type { PreviewMessage } from "@visionrig/types";
import type { PreviewFeed } from "./preview-feed";

const logger = createLogger("ws-preview");

interface WSClient {
  ws: WebSocket;
  viewerId: string;
}

export class PreviewWebSocketServer {
  private wss: WebSocketServer | null = null;
  private clients = new Set<WSClient>();

  constructor(
    fastify: FastifyInstance,
    private readonly feed: PreviewFeed,
  ) {
    this.wss = new WebSocketServer({
      server: fastify.server,
      path: API_ENDPOINTS.WS_PREVIEW,
    });

    this.wss.on("connection", (ws: WebSocket) => this.handleConnection(ws));

    logger.info(
      `WebSocket: Preview server initialized on ${API_ENDPOINTS.WS_PREVIEW}`,
    );
  }

  private handleConnection(ws: WebSocket): void {
    ws.send(
      JSON.stringify({
        type: "connection",
        data: { status: "connected" },
        timestamp: new Date().toISOString(),
      }),
    );

    const viewerId = this.feed.addViewer({
      send: (message: PreviewMessage) => {
        if (ws.readyState !== WebSocket.OPEN) {
          throw new Error("Socket is not open");
        }
        ws.send(JSON.stringify(message), (error) => {
          if (error) {
            logger.warn(`WebSocket: Send failed, dropping viewer`, {
              error: error.message,
            });
            this.detach(client);
          }
        });
      },
    });

    const client: WSClient = { ws, viewerId };
    this.clients.add(client);
    logger.info(
      `WebSocket: Client ${viewerId} connected (${this.clients.size} total)`,
    );

    ws.on("close", () => {
      this.detach(client);
      logger.info(
        `WebSocket: Client ${viewerId} disconnected (${this.clients.size} remaining)`,
      );
    });

    ws.on("error", (error: Error) => {
      logger.error(`WebSocket: Client ${viewerId} error`, {
        error: error.message,
      });
      this.detach(client);
    });
  }

  private detach(client: WSClient): void {
    this.feed.removeViewer(client.viewerId);
    this.clients.delete(client);
  }

  getClientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (!this.wss) {
      return;
    }
    for (const client of this.clients) {
      this.feed.removeViewer(client.viewerId);
      client.ws.close();
    }
    this.clients.clear();
    this.wss.close();
    this.wss = null;
    logger.info("WebSocket: Server closed");
  }
}
