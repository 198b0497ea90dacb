import type { SerialConfig } from "../config";
import { PtyTransport } from "./ptyTransport";
import type { SerialTransport } from "./serialTransport";
import { TcpTransport } from "./tcpTransport";

export function createTransport(config: SerialConfig): SerialTransport {
  switch (config.mode) {
    case "tcp":
      return new TcpTransport({ port: config.tcpPort });
    case "pty":
      return new PtyTransport({ path: config.ptyPath });
  }
}
