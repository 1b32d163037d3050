export type CliArgs = Record<string, string | boolean>;

export function parseArgs(argv: string[]): CliArgs {
  const opts: CliArgs = {};
  for (const arg of argv) {
    const m = arg.match(/^--([^=]+)(=(.*))?$/);
    if (m) {
      opts[m[1]] = m[3] ?? true;
    }
  }
  return opts;
}

const NUMERIC_FLAGS: Record<string, string> = {
  maxReels: "maxReels",
  minDuration: "minDurationSeconds",
  maxDuration: "maxDurationSeconds",
  paddingBefore: "paddingBeforeSeconds",
  paddingAfter: "paddingAfterSeconds",
  workers: "workerCount"
};

/** Maps CLI flags onto a run request; validation happens in the orchestrator. */
export function toRunRequest(args: CliArgs, defaultWorkers: number) {
  const request: Record<string, unknown> = {
    input: typeof args.input === "string" ? args.input : "",
    workerCount: defaultWorkers
  };
  for (const [flag, field] of Object.entries(NUMERIC_FLAGS)) {
    const value = args[flag];
    if (typeof value === "string") {
      request[field] = value;
    }
  }
  if (args.speedUpAudio !== undefined) {
    request.speedUpAudio = isTrue(args.speedUpAudio);
  }
  if (typeof args.platforms === "string") {
    request.targetPlatforms = args.platforms
      .split(",")
      .map((value) => value.trim())
      .filter(Boolean);
  }
  if (typeof args.language === "string") {
    request.language = args.language;
  }
  if (typeof args.focusSpeaker === "string") {
    request.focusSpeaker = args.focusSpeaker;
  }
  if (args.retain !== undefined) {
    request.retainArtifacts = isTrue(args.retain);
  }
  return request;
}

function isTrue(value: string | boolean) {
  return value === true || value === "true" || value === "1";
}
