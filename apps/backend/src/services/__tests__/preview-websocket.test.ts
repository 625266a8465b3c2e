import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { WebSocket, type RawData } from "ws";
import { createApp } from "../../app";
import { createTestRig, testConfig } from "../../__tests__/helpers";
import { PreviewWebSocketServer } from "../preview-websocket";
import { VisionCore } from "../vision-core";

describe("PreviewWebSocketServer", () => {
  let core: VisionCore;
  let app: FastifyInstance;
  let server: PreviewWebSocketServer;
  let url: string;

  beforeEach(async () => {
    const rig = createTestRig();
    core = new VisionCore(testConfig(), {
      createCamera: rig.createCamera,
      createLight: rig.createLight,
    });
    await core.start();
    app = await createApp(core);
    await app.listen({ port: 0, host: "127.0.0.1" });
    server = new PreviewWebSocketServer(app, core.feed);

    const address = app.server.address();
    const port = typeof address === "object" && address ? address.port : 0;
    url = `ws://127.0.0.1:${port}/ws/preview`;
  });

  afterEach(async () => {
    server.close();
    await app.close();
    await core.stop();
  });

  it("greets the client and streams preview frames", async () => {
    const client = new WebSocket(url);
    const messages: Array<{ type: string }> = [];
    client.on("message", (data: RawData) => {
      messages.push(JSON.parse(data.toString()));
    });

    await vi.waitFor(
      () => {
        expect(messages.length).toBeGreaterThanOrEqual(2);
      },
      { timeout: 3000 },
    );

    expect(messages[0].type).toBe("connection");
    expect(messages[1].type).toBe("preview");
    expect(server.getClientCount()).toBe(1);
    expect(core.feed.viewerCount).toBe(1);

    client.close();
    await vi.waitFor(() => {
      expect(server.getClientCount()).toBe(0);
    });
    expect(core.feed.viewerCount).toBe(0);
  });
});
