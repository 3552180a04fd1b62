/**
 * @capture-session/cli
 *
 * CLI for the capture session daemon.
 * Commands: start, stop, status, session, sessions, names, config
 */

import { Command, Option } from "commander";
import { RECORDING_MODES, CAMERA_ROLES } from "@capture-session/core";
import { collect } from "./args.js";
import { startCommand } from "./commands/start.js";
import { stopCommand } from "./commands/stop.js";
import { statusCommand } from "./commands/status.js";
import {
  sessionAudioNameCommand,
  sessionCameraNameCommand,
  sessionCleanupCommand,
  sessionCreateCommand,
  sessionCurrentCommand,
  sessionFinalizeCommand,
  sessionMetaCommand,
  sessionPlanCommand,
  sessionRegisterCommand,
} from "./commands/session.js";
import { sessionsListCommand, sessionsShowCommand } from "./commands/sessions.js";
import { namesResolveCommand } from "./commands/names.js";
import {
  configInitCommand,
  configReloadCommand,
  configShowCommand,
} from "./commands/config.js";

const program = new Command();

program
  .name("capture-session")
  .description("Session manager for multi-device camera and audio recordings")
  .version("0.1.0");

program
  .command("start")
  .description("Start the daemon")
  .option("-d, --daemon", "Run in background (daemon mode)")
  .action(async (options) => {
    await startCommand(options);
  });

program
  .command("stop")
  .description("Stop the daemon (cleans up an unfinished session)")
  .option("-f, --force", "Force kill if not responding")
  .action(async (options) => {
    await stopCommand(options);
  });

program
  .command("status")
  .description("Show daemon status")
  .action(async () => {
    await statusCommand();
  });

// Active session subcommand group
const session = program
  .command("session")
  .description("Drive the active recording session");

session
  .command("create")
  .description("Create a session and its output directory")
  .option("-t, --timestamp <timestamp>", "Session timestamp (default: now)")
  .addOption(
    new Option("-m, --mode <mode>", "Recording mode (default: from config)").choices(
      RECORDING_MODES
    )
  )
  .action(async (options) => {
    await sessionCreateCommand(options);
  });

session
  .command("current")
  .description("Show the active session")
  .option("--json", "Output as JSON")
  .action(async (options) => {
    await sessionCurrentCommand(options);
  });

session
  .command("plan")
  .description("List configured devices with their filenames")
  .action(async () => {
    await sessionPlanCommand();
  });

session
  .command("camera-name <host> <index>")
  .description("Print the canonical filename for a camera")
  .addOption(
    new Option("-r, --role <role>", "Camera role")
      .choices(CAMERA_ROLES)
      .default("master")
  )
  .action(async (host, index, options) => {
    await sessionCameraNameCommand(host, index, options);
  });

session
  .command("audio-name <index>")
  .description("Print the canonical filename for an audio device")
  .action(async (index) => {
    await sessionAudioNameCommand(index);
  });

session
  .command("register <filenames...>")
  .description("Register files written into the session directory")
  .action(async (filenames) => {
    await sessionRegisterCommand(filenames);
  });

session
  .command("meta <pairs...>")
  .description("Add key=value metadata to the active session")
  .action(async (pairs) => {
    await sessionMetaCommand(pairs);
  });

session
  .command("finalize")
  .description("Write the session manifest and end the session")
  .option("--meta <key=value>", "Extra metadata (repeatable)", collect, [])
  .action(async (options) => {
    await sessionFinalizeCommand(options);
  });

session
  .command("cleanup")
  .description("Remove the files of a failed session and end it")
  .action(async () => {
    await sessionCleanupCommand();
  });

// Session history subcommand group
const sessions = program.command("sessions").description("Browse session history");

sessions
  .command("list")
  .description("List recorded sessions")
  .addOption(
    new Option("-s, --status <status>", "Filter by status").choices([
      "active",
      "finalized",
      "aborted",
    ])
  )
  .action(async (options) => {
    await sessionsListCommand(options);
  });

sessions
  .command("show <id>")
  .description("Show session details and manifest")
  .action(async (id) => {
    await sessionsShowCommand(id);
  });

// Device names
const names = program.command("names").description("Device name lookup");

names
  .command("resolve <class> <index>")
  .description("Resolve the friendly name of a camera or audio device")
  .option("--host <host>", "Camera host identifier", "local")
  .action((deviceClass, index, options) => {
    if (deviceClass !== "camera" && deviceClass !== "audio") {
      program.error(`Unknown device class "${deviceClass}" (expected camera or audio)`);
    }
    namesResolveCommand(deviceClass, index, options);
  });

// Recording configuration
const config = program.command("config").description("Recording configuration");

config
  .command("show")
  .description("Print the effective recording configuration")
  .action(() => {
    configShowCommand();
  });

config
  .command("init")
  .description("Write the default configuration file")
  .option("-f, --force", "Overwrite an existing file")
  .action((options) => {
    configInitCommand(options);
  });

config
  .command("reload")
  .description("Make the daemon reload its configuration file")
  .action(async () => {
    await configReloadCommand();
  });

await program.parseAsync();
