import config from "~/config";
import { UnsupportedPluginError } from "./errors";
import type { Job, JobResult } from "./job";
import type { PluginManager } from "./manager";

export interface TaskStep {
  name: string;
  taskId: string;
  // Defaults to "main".
  stage?: string;
  // Defaults to the most recently registered reference for taskId whose
  // stage matches.
  typeReference?: string;
  inputs?: Record<string, string>;
  environment?: Record<string, string>;
}

export class JobRunner {
  constructor(private manager: PluginManager) {
    this.manager = manager;
  }

  async run(job: Job, steps: TaskStep[]): Promise<JobResult> {
    config.logger.info(
      { jobId: job.id, steps: steps.map((s) => s.name) },
      "starting job",
    );
    for (const step of steps) {
      if (job.signal.aborted) {
        break;
      }
      try {
        await this.runStep(job, step);
      } catch (err) {
        config.logger.error(
          { err, jobId: job.id, step: step.name },
          "step error",
        );
        job.fail(err);
        break;
      }
    }
    const joined = await job.asyncCommands.joinAll();
    return job.complete(joined);
  }

  private selectReference(step: TaskStep): string {
    const references = this.manager.getTaskPlugins(step.taskId);
    if (!references || references.length === 0) {
      throw new UnsupportedPluginError(step.taskId);
    }
    if (step.typeReference !== undefined) {
      if (!references.includes(step.typeReference)) {
        throw new UnsupportedPluginError(step.typeReference);
      }
      return step.typeReference;
    }

    const stage = step.stage ?? "main";
    for (let i = references.length - 1; i >= 0; i--) {
      if (this.manager.getTaskStage(references[i]) === stage) {
        return references[i];
      }
    }
    throw new UnsupportedPluginError(`${step.taskId} (${stage})`);
  }

  private async runStep(job: Job, step: TaskStep): Promise<void> {
    const typeReference = this.selectReference(step);

    config.logger.info(
      { jobId: job.id, step: step.name, typeReference },
      "starting step",
    );
    await this.manager.runTask(
      job,
      typeReference,
      step.inputs ?? {},
      step.environment ?? {},
      job.variables,
      (line) => {
        if (!this.manager.processLine(job, line)) {
          job.output(line);
        }
      },
    );
    config.logger.info(
      { jobId: job.id, step: step.name, typeReference },
      "finished step",
    );
  }
}
