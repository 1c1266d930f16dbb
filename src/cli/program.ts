import { Cli } from "clipanion";
import { VERSION } from "../version.js";
import { RunCommand } from "./commands/run.js";
import { StatusCommand } from "./commands/status.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { DoctorCommand } from "./commands/doctor.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "onair",
    binaryName: "onair",
    binaryVersion: VERSION,
  });

  cli.register(RunCommand);
  cli.register(StatusCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(DoctorCommand);

  return cli;
}
