import { serve } from "@hono/node-server";
import * as http from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import type { Emulator, EmulatorEvent, EmulatorSnapshot } from "../src/emulator";
import { createDashboardApp } from "./app";

export interface DashboardOptions {
  host: string;
  port: number;
}

export interface Dashboard {
  close(): Promise<void>;
}

type PushMessage =
  | { type: "snapshot"; snapshot: EmulatorSnapshot }
  | { type: "transition"; event: EmulatorEvent; snapshot: EmulatorSnapshot };

/**
 * REST API on `/api` and a live event feed on `/ws`: one `snapshot` message
 * when a client connects, then a `transition` message per emulator event.
 */
export function startDashboard(emulator: Emulator, options: DashboardOptions): Dashboard {
  const app = createDashboardApp(emulator);

  const server = serve(
    { fetch: app.fetch, port: options.port, hostname: options.host },
    (info) => {
      console.log(`[DASHBOARD] Listening on http://${options.host}:${info.port}`);
    },
  );

  if (!(server instanceof http.Server)) {
    throw new Error("Dashboard expected a plain HTTP server");
  }

  const wss = new WebSocketServer({ server, path: "/ws" });

  const send = (socket: WebSocket, message: PushMessage) => {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(message));
    }
  };

  wss.on("connection", (socket) => {
    socket.on("error", (err) => console.error("[DASHBOARD] WebSocket error:", err.message));
    send(socket, { type: "snapshot", snapshot: emulator.getSnapshot() });
  });

  const unsubscribe = emulator.onTransition((event) => {
    const message: PushMessage = { type: "transition", event, snapshot: emulator.getSnapshot() };
    for (const client of wss.clients) {
      send(client, message);
    }
  });

  return {
    close: async () => {
      unsubscribe();
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve) => server.close(() => resolve()));
      console.log("[DASHBOARD] Stopped");
    },
  };
}
