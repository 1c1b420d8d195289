/**
 * Command Line Entry
 *
 *   gas-labeler status <folder>
 *   gas-labeler replay <folder> --script events.json [--config labeler.json]
 *
 * Masks and overlays are written next to <folder>, in masks/ and overlays/.
 */
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig, toBrushSettings, toKeymap, toOverlayStyle } from "./config";
import { EventBus } from "./core/event-bus";
import { SessionController } from "./core/session-controller";
import { readEventScript } from "./io/event-script";
import { FsFrameStore, SUPPORTED_FORMATS } from "./io/fs-frame-store";
import { attachSessionLogger } from "./session-logger";
import { runSession } from "./session-runner";

async function status(folder: string) {
  const store = new FsFrameStore(folder);
  const [frames, labeled] = await Promise.all([store.listFrames(), store.listLabeled()]);

  console.log(`Selected folder : ${store.framesDir}`);
  console.log(`Masks output    : ${store.masksDir}`);
  console.log(`Overlays output : ${store.overlaysDir}`);
  console.log(`Total images    : ${frames.length}`);
  console.log(`Already labeled : ${labeled.length}`);
  console.log(`To label        : ${frames.length - labeled.length}`);
}

async function replay(folder: string, script: string, configFile?: string) {
  const config = await loadConfig(configFile);
  const store = new FsFrameStore(folder, { overlayQuality: config.overlay.quality });

  const frames = await store.listFrames();
  if (frames.length === 0) {
    console.warn(`No images found in: ${store.framesDir}`);
    console.warn(`Supported formats: ${SUPPORTED_FORMATS.join(", ")}`);
    return;
  }

  const events = await readEventScript(script);
  const bus = new EventBus();
  const detach = attachSessionLogger(bus);
  const controller = new SessionController(store, {
    brush: toBrushSettings(config),
    style: toOverlayStyle(config),
    keymap: toKeymap(config),
    bus,
  });

  try {
    await runSession(controller, events);
  } finally {
    detach();
  }
}

yargs(hideBin(process.argv))
  .scriptName("gas-labeler")
  .command(
    "status <folder>",
    "Show how many images in a folder are labeled",
    (y) => y.positional("folder", { type: "string", demandOption: true }),
    (argv) => status(argv.folder)
  )
  .command(
    "replay <folder>",
    "Label a folder by replaying a JSON event script",
    (y) =>
      y
        .positional("folder", { type: "string", demandOption: true })
        .option("script", {
          alias: "s",
          type: "string",
          description: "JSON file with the input events",
          demandOption: true,
        })
        .option("config", {
          alias: "c",
          type: "string",
          description: "JSON labeler configuration",
        }),
    (argv) => replay(argv.folder, argv.script, argv.config)
  )
  .demandCommand(1)
  .strict()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
