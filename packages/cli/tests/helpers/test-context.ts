/**
 * Command context wired to the in-process gateway used by the workflow tests
 */

import { BatchOrchestrator } from '@alphaminer/workflows';
import { CommandContext, type CommandServices } from '../../src/core/command-context';
import {
  FakeGateway,
  createTestContext,
  noSleep,
  type JobScript,
} from '../../../workflows/tests/helpers/fake-gateway';

export interface TestHarness {
  ctx: CommandContext;
  gateway: FakeGateway;
  services: CommandServices & { workflow: ReturnType<typeof createTestContext> };
  stdout: string[];
  stderr: string[];
  failures: number;
}

export function createHarness(scripts: Record<string, JobScript> = {}): TestHarness {
  const gateway = new FakeGateway((expression) => scripts[expression] ?? {});
  const workflow = createTestContext();
  const orchestrator = new BatchOrchestrator({
    gateway,
    sleep: noSleep,
    reports: workflow.reports,
    ids: workflow.ids,
  });

  const harness: TestHarness = {
    gateway,
    services: {
      workflow,
      orchestrator,
      submissions: gateway,
      limits: { maxConcurrentSimulations: 2, maxConcurrentSubmissions: 2 },
    },
    stdout: [],
    stderr: [],
    failures: 0,
    ctx: new CommandContext(),
  };

  harness.ctx = new CommandContext({
    servicesFactory: () => harness.services,
    stdout: (text) => harness.stdout.push(text),
    stderr: (text) => harness.stderr.push(text),
    onFailure: () => {
      harness.failures += 1;
    },
  });
  return harness;
}
