import type { ShellCommandResult } from "@sidescreen/shared";

import type { CommandChannel } from "../src/shell/channel.js";

type Reply = ShellCommandResult | ((command: string) => ShellCommandResult | Promise<ShellCommandResult>);

/**
 * In-memory channel: records every command line and answers from rules
 * registered with `on`. Later rules win; unmatched commands succeed with no
 * output.
 */
export class FakeChannel implements CommandChannel {
  readonly commands: string[] = [];
  private readonly rules: Array<{ pattern: RegExp; reply: Reply }> = [];

  on(pattern: RegExp, reply: Reply): this {
    this.rules.unshift({ pattern, reply });
    return this;
  }

  async execute(command: string): Promise<ShellCommandResult> {
    this.commands.push(command);
    const rule = this.rules.find((r) => r.pattern.test(command));
    if (!rule) return { success: true, output: "" };
    return typeof rule.reply === "function" ? rule.reply(command) : rule.reply;
  }

  /** Commands matching `pattern`, in order. */
  matching(pattern: RegExp): string[] {
    return this.commands.filter((c) => pattern.test(c));
  }
}

/** A channel that answers screenshot size checks, as a device with working screencap would. */
export function deviceChannel(): FakeChannel {
  return new FakeChannel().on(/^stat -c %s /, { success: true, output: "48213" });
}
