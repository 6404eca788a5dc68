#!/usr/bin/env node
/**
 * sidescreen command line entry point.
 *
 * Usage:
 *   sidescreen [--script=responses.json] [--no-virtual-display] [goal...]
 *
 * Without a goal on the command line the goal is read from stdin.
 */

import { createInterface } from "node:readline/promises";

import { ActionDispatcher } from "./actions.js";
import { runAgent } from "./agent/loop.js";
import { MockModelProvider, ScriptedModelProvider, type ModelProvider } from "./agent/model.js";
import { ScreenObserver } from "./agent/observer.js";
import { loadConfig, loadDotenv, type AppConfig } from "./config.js";
import { AppLauncher } from "./display/app-launcher.js";
import { BroadcastInputMethod, ShellTextInput } from "./display/input-method.js";
import { ScreenController } from "./display/screen.js";
import { VirtualDisplayManager } from "./display/virtual-display.js";
import { ConsoleLogger, SessionLogger, describeError, type Logger } from "./logger.js";
import { AdbArtifactReader, LocalArtifactReader, type ArtifactReader } from "./shell/artifacts.js";
import { AdbShellChannel, LocalShellChannel, withDeadline, type CommandChannel } from "./shell/channel.js";

const TAG = "Kernel";

interface CliArgs {
  goal: string;
  script?: string;
  virtualDisplay?: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const words: string[] = [];
  const args: CliArgs = { goal: "" };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--script") {
      args.script = argv[++i];
    } else if (arg.startsWith("--script=")) {
      args.script = arg.slice("--script=".length);
    } else if (arg === "--no-virtual-display") {
      args.virtualDisplay = false;
    } else {
      words.push(arg);
    }
  }
  args.goal = words.join(" ").trim();
  return args;
}

function createChannel(config: AppConfig, logger: Logger): { channel: CommandChannel; reader: ArtifactReader } {
  if (config.SHELL_MODE === "local") {
    return {
      channel: new LocalShellChannel(config.COMMAND_TIMEOUT_MS),
      reader: new LocalArtifactReader(logger),
    };
  }
  const adb = new AdbShellChannel({
    adbPath: config.ADB_PATH,
    serial: config.ADB_SERIAL,
    timeoutMs: config.COMMAND_TIMEOUT_MS,
    retries: config.MAX_RETRIES,
    logger,
  });
  // Per-attempt timeouts plus backoff; bound the whole call as well
  const deadline = config.COMMAND_TIMEOUT_MS * (config.MAX_RETRIES + 1) + 1000 * 2 ** (config.MAX_RETRIES + 1);
  return {
    channel: withDeadline(adb, deadline),
    reader: new AdbArtifactReader(adb, logger, config.COMMAND_TIMEOUT_MS),
  };
}

async function main(): Promise<number> {
  loadDotenv();
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (e) {
    console.error(`Configuration Error: ${describeError(e)}`);
    return 1;
  }

  const logger = new ConsoleLogger(config.LOG_LEVEL, config.LOG_FILE || undefined);
  const args = parseArgs(process.argv.slice(2));
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn(TAG, "Interrupted, shutting down");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const { channel, reader } = createChannel(config, logger);
  const inputMethod =
    config.INPUT_METHOD === "broadcast" ? new BroadcastInputMethod(channel, logger) : new ShellTextInput(channel, logger);
  const screen = new ScreenController(channel, logger, inputMethod, config.SCREENSHOT_DIR);
  const virtualDisplay = new VirtualDisplayManager(channel, logger, {
    name: config.VD_NAME,
    fallbackId: config.VD_FALLBACK_ID,
    screenshotDir: config.SCREENSHOT_DIR,
    readyDelayMs: config.VD_READY_DELAY_MS,
    resolveAttempts: config.VD_RESOLVE_ATTEMPTS,
  });
  const dispatcher = new ActionDispatcher({
    screen,
    virtualDisplay,
    launcher: new AppLauncher(channel, logger),
    logger,
  });
  const observer = new ScreenObserver({
    channel,
    screen,
    virtualDisplay,
    reader,
    logger,
    maxElements: config.MAX_ELEMENTS,
  });

  try {
    const provider: ModelProvider = args.script ? ScriptedModelProvider.fromFile(args.script) : new MockModelProvider();
    const goal = args.goal || (await rl.question("Enter your goal: ")).trim();
    if (!goal) {
      logger.info(TAG, "No goal provided. Exiting.");
      return 0;
    }

    const resolution = await screen.getScreenSize();
    if (resolution) {
      dispatcher.setScreenResolution(resolution[0], resolution[1]);
      logger.info(TAG, `Screen resolution: ${resolution[0]}x${resolution[1]}`);
    }

    if (args.virtualDisplay ?? config.VIRTUAL_DISPLAY) {
      const created = await virtualDisplay.createDisplay(config.VD_WIDTH, config.VD_HEIGHT, config.VD_DPI);
      if (!created) {
        logger.warn(TAG, "Virtual display unavailable, automating the primary display");
      }
    }

    const result = await runAgent(
      goal,
      {
        provider,
        observer,
        dispatcher,
        logger,
        session: new SessionLogger(config.LOG_DIR, goal, provider.providerName),
      },
      {
        maxSteps: config.MAX_STEPS,
        stepDelay: config.STEP_DELAY,
        maxFailures: config.MAX_FAILURES,
        stuckThreshold: config.STUCK_THRESHOLD,
        signal: controller.signal,
        confirm: async (response) => {
          const answer = await rl.question(`Confirm ${response.action?.actionType ?? "action"}: ${response.message} [y/N] `);
          return /^y(es)?$/i.test(answer.trim());
        },
      }
    );

    logger.info(TAG, `Finished: ${result.reason} after ${result.stepsUsed} step(s)`);
    return result.success ? 0 : 1;
  } catch (e) {
    logger.error(TAG, "Run failed", e);
    return 1;
  } finally {
    await virtualDisplay.removeDisplay();
    process.off("SIGINT", onSigint);
    rl.close();
    await logger.flush();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Fatal: ${describeError(err)}`);
    process.exitCode = 1;
  }
);
