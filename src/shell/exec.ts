import type { ShellCommandResult } from "@sidescreen/shared";

import { describeError, type Logger } from "../logger.js";
import type { CommandChannel } from "./channel.js";
import { serializeCommand, type ShellCommand } from "./commands.js";

/**
 * Serializes and runs one command. Never throws: builder errors and channel
 * rejections come back as a failed result and are logged under `tag`.
 */
export async function executeCommand(
  channel: CommandChannel,
  logger: Logger,
  tag: string,
  command: ShellCommand
): Promise<ShellCommandResult> {
  let line: string;
  try {
    line = serializeCommand(command);
  } catch (err) {
    logger.error(tag, `Rejected ${command.kind} command`, err);
    return { success: false, error: describeError(err) };
  }

  logger.debug(tag, `exec: ${line}`);
  try {
    const result = await channel.execute(line);
    if (!result.success) {
      logger.debug(tag, `${command.kind} failed: ${result.error ?? "no error output"}`);
    }
    return result;
  } catch (err) {
    logger.error(tag, `Channel error running ${command.kind}`, err);
    return { success: false, error: describeError(err) };
  }
}
