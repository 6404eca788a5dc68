/**
 * Text entry. Key injection cannot express arbitrary Unicode, so text goes
 * to an input method instead of being typed key by key.
 */

import type { Logger } from "../logger.js";
import type { CommandChannel } from "../shell/channel.js";
import { executeCommand } from "../shell/exec.js";

export interface TextInputMethod {
  readonly name: string;
  /** Forwards `text`; resolves to whether the input method accepted it. */
  inputText(text: string, displayId?: number): Promise<boolean>;
}

/**
 * Sends the text base64-encoded in a broadcast to a keyboard app that is
 * installed and selected as the current input method (ADBKeyboard and
 * compatible). Handles any Unicode; the focused field on whichever display
 * has focus receives it.
 */
export class BroadcastInputMethod implements TextInputMethod {
  readonly name = "broadcast";

  constructor(private readonly channel: CommandChannel, private readonly logger: Logger) {}

  async inputText(text: string): Promise<boolean> {
    const result = await executeCommand(this.channel, this.logger, "BroadcastInputMethod", { kind: "ime-text", text });
    return result.success;
  }
}

/**
 * Falls back to `input text`. Reliable for ASCII only.
 */
export class ShellTextInput implements TextInputMethod {
  readonly name = "shell";

  constructor(private readonly channel: CommandChannel, private readonly logger: Logger) {}

  async inputText(text: string, displayId?: number): Promise<boolean> {
    if (/[^\x00-\x7e]/.test(text)) {
      this.logger.warn("ShellTextInput", "Text contains non-ASCII characters; `input text` may drop them");
    }
    const result = await executeCommand(this.channel, this.logger, "ShellTextInput", {
      kind: "input-text",
      text,
      displayId,
    });
    return result.success;
  }
}
