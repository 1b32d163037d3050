import { promises as fs } from "node:fs";
import path from "node:path";
import { PipelineError, formatError } from "../../domain/errors";
import type { ArtifactScope, LoggerPort, RunWorkspace, StoragePort } from "../../interfaces/ports";

const SAFE_NAME = /^[A-Za-z0-9._-]+$/;

/**
 * Intermediate artifacts live under `<storageBase>/runs/<runId>`; finished reels
 * under `<outputBase>/<runId>`, which is never removed.
 */
export class LocalStorage implements StoragePort {
  constructor(
    private readonly storageBase: string,
    private readonly outputBase: string,
    private readonly logger: LoggerPort
  ) {}

  async createRunWorkspace(runId: string, options: { retainArtifacts: boolean }): Promise<RunWorkspace> {
    assertSafeName(runId);
    const dir = path.join(this.storageBase, "runs", runId);
    const outputDir = path.join(this.outputBase, runId);
    await mkdir(dir);
    await mkdir(outputDir);

    const logger = this.logger;
    const retain = options.retainArtifacts;

    return {
      dir,
      outputDir,
      async scope(name: string): Promise<ArtifactScope> {
        assertSafeName(name);
        const scopeDir = path.join(dir, name);
        await mkdir(scopeDir);
        return {
          dir: scopeDir,
          file: (fileName: string) => path.join(scopeDir, fileName),
          async release() {
            if (retain) {
              await logger.info(runId, `Keeping artifacts of ${name} in ${scopeDir}.`);
              return;
            }
            await fs.rm(scopeDir, { recursive: true, force: true });
          }
        };
      },
      async release() {
        if (retain) {
          await logger.info(runId, `Keeping intermediate artifacts in ${dir}.`);
          return;
        }
        await fs.rm(dir, { recursive: true, force: true });
      }
    };
  }
}

function assertSafeName(name: string) {
  if (!SAFE_NAME.test(name) || name === "." || name === "..") {
    throw new PipelineError(`Unsafe storage name: ${name}`, "invalid-input");
  }
}

async function mkdir(dir: string) {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    throw new PipelineError(`Cannot create ${dir}: ${formatError(error)}`, "tool-failure", { cause: error });
  }
}
