import { appendChecksum, stripChecksum } from "./checksum";
import { RAPI_COMMANDS } from "./commands";
import {
  type RapiCommandDescriptor,
  type RapiReply,
  type RapiTarget,
  rejected,
} from "./rapiCommand";

export interface RapiEngineOptions {
  appendChecksum?: boolean;
}

export interface RapiExchange {
  /** The received line echoed back, when echo mode was on as it arrived */
  echo: string | null;
  response: string;
}

export class RapiEngine {
  private readonly commands = new Map<string, RapiCommandDescriptor>();
  private readonly appendChecksum: boolean;

  constructor(
    options: RapiEngineOptions = {},
    commands: readonly RapiCommandDescriptor[] = RAPI_COMMANDS,
  ) {
    this.appendChecksum = options.appendChecksum ?? false;
    for (const command of commands) {
      this.commands.set(command.code, command);
    }
  }

  /** Must run inside the emulator's critical section. */
  process(rawLine: string, target: RapiTarget): RapiExchange {
    const line = rawLine.replace(/[\r\n]+$/, "").trim();
    const echo = target.evse.isEchoMode() ? `${line}\r` : null;
    return { echo, response: this.format(this.run(line, target)) };
  }

  private run(line: string, target: RapiTarget): RapiReply {
    if (!line.startsWith("$")) {
      return rejected();
    }

    const checked = stripChecksum(line);
    if (checked.present && !checked.valid) {
      return rejected();
    }

    const [code, ...params] = checked.body.slice(1).trim().split(/\s+/);
    if (code === undefined || code.length !== 2) {
      return rejected();
    }

    const command = this.commands.get(code.toUpperCase());
    if (!command) {
      return rejected();
    }

    try {
      return command.dispatch(target, params);
    } catch (err) {
      console.error(`[RAPI] ${command.code} handler failed:`, err);
      return rejected();
    }
  }

  format(reply: RapiReply): string {
    const text = reply.ok
      ? reply.fields.length > 0
        ? `$OK ${reply.fields.join(" ")}`
        : "$OK"
      : "$NK";
    return `${this.appendChecksum ? appendChecksum(text) : text}\r`;
  }
}
