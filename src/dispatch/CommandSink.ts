import type { ParamCommand } from '../types/formant.js';

/**
 * Destination that applies one parameter change at a time, e.g. the
 * librarian on a slow serial link.
 */
export interface CommandSink {
  send(command: ParamCommand): Promise<void>;
}

/** Logs commands instead of sending them; used for offline shaping. */
export class DryRunSink implements CommandSink {
  readonly sent: ParamCommand[] = [];

  async send(command: ParamCommand): Promise<void> {
    this.sent.push(command);
    console.log(`[dispatch] (dry-run) ${command.param}=${command.value}`);
  }
}
