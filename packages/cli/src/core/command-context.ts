/**
 * Command Context - Lazy service creation
 *
 * This is NOT a framework - just an object that knows how to create services
 * on first use, so commands that fail validation never read credentials.
 */

import { loadConfig } from '@alphaminer/utils';
import {
  createProductionServices,
  type BatchOrchestrator,
  type SubmissionGateway,
  type WorkflowContext,
} from '@alphaminer/workflows';

/**
 * Services available in command context
 */
export interface CommandServices {
  workflow: WorkflowContext;
  orchestrator: BatchOrchestrator;
  submissions: SubmissionGateway;
  limits: {
    maxConcurrentSimulations: number;
    maxConcurrentSubmissions: number;
  };
}

export type OutputWriter = (text: string) => void;

/**
 * Options for creating a CommandContext with overrides (used by tests)
 */
export interface CommandContextOptions {
  servicesFactory?: () => CommandServices;
  stdout?: OutputWriter;
  stderr?: OutputWriter;
  /** Called when a command fails; defaults to setting a non-zero exit code */
  onFailure?: () => void;
}

export function createDefaultServices(): CommandServices {
  const { ctx, client, orchestrator, config } = createProductionServices(loadConfig());
  return {
    workflow: ctx,
    orchestrator,
    submissions: client,
    limits: {
      maxConcurrentSimulations: config.MAX_CONCURRENT_SIMULATIONS,
      maxConcurrentSubmissions: config.MAX_CONCURRENT_SUBMISSIONS,
    },
  };
}

export class CommandContext {
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  get services(): CommandServices {
    if (!this._services) {
      const factory = this._options.servicesFactory ?? createDefaultServices;
      this._services = factory();
    }
    return this._services;
  }

  write(text: string): void {
    const stdout = this._options.stdout ?? ((t: string) => process.stdout.write(`${t}\n`));
    stdout(text);
  }

  writeError(text: string): void {
    const stderr = this._options.stderr ?? ((t: string) => process.stderr.write(`${t}\n`));
    stderr(text);
  }

  markFailed(): void {
    if (this._options.onFailure) {
      this._options.onFailure();
    } else {
      process.exitCode = 1;
    }
  }
}
