import { type Datastore, TaskStatus } from '../datastore';
import { TERMINAL_STATUSES } from '../state-machine';
import type { ArtifactReleaser, StalenessSweeper, SweepRule } from '.';
import { SimpleSweeper, type SimpleSweeperConfiguration } from './simple-sweeper';

/**
 * Configuration for the staleness sweeper.
 * @default { type: 'simple' }
 */
export type SweeperConfiguration = SimpleSweeperConfiguration & {
  type?: 'simple';
  /** Records never started are deleted once older than this. @default 3_600_000ms (1 hour) */
  createdTaskMaxAgeMs?: number;
  /** Terminal records are deleted once untouched for this long. @default 86_400_000ms (24 hours) */
  terminalRetentionMs?: number;
  /** Releases the artifacts of terminal records deleted by the default retention rule */
  artifactReleaser?: ArtifactReleaser;
  /** Replaces the default rules entirely */
  rules?: SweepRule[];
};

const DEFAULT_CREATED_TASK_MAX_AGE_MS = 3_600_000;
const DEFAULT_TERMINAL_RETENTION_MS = 86_400_000;

export type CreateSweeperInput<DatastoreOptions> = {
  datastore: Datastore<DatastoreOptions>;
  configuration?: SweeperConfiguration;
};

export function defaultSweepRules(configuration: SweeperConfiguration = {}): SweepRule[] {
  return [
    {
      name: 'unstarted',
      statuses: [TaskStatus.CREATED],
      timestampField: 'createdAt',
      maxAgeMs: configuration.createdTaskMaxAgeMs ?? DEFAULT_CREATED_TASK_MAX_AGE_MS,
    },
    {
      name: 'retention',
      statuses: [...TERMINAL_STATUSES],
      timestampField: 'updatedAt',
      maxAgeMs: configuration.terminalRetentionMs ?? DEFAULT_TERMINAL_RETENTION_MS,
      artifactReleaser: configuration.artifactReleaser,
    },
  ];
}

export function createSweeper<DatastoreOptions>(input: CreateSweeperInput<DatastoreOptions>): StalenessSweeper {
  const config = input.configuration ?? {};
  const type = config.type ?? 'simple';

  if (type === 'simple') {
    const rules = config.rules ?? defaultSweepRules(config);

    return new SimpleSweeper<DatastoreOptions>({
      datastore: input.datastore,
      rules,
      configuration: config,
    });
  }

  throw new Error(`Unknown sweeper type: ${type}`);
}
