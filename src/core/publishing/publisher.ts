import type { AppConfig } from '../../config/index.js';
import { formatIsoDate } from '../../utils/helpers.js';
import { pickOne, type Clock, type RandomSource } from '../random.js';
import type { PublishResult } from '../types.js';
import type { GitRunner } from './gitRunner.js';

export const COMMIT_VERBS = [
  'Update',
  'Add',
  'Revise',
  'Improve',
  'Enhance',
] as const;

export class Publisher {
  constructor(
    private readonly config: AppConfig,
    private readonly git: GitRunner,
    private readonly random: RandomSource,
    private readonly clock: Clock
  ) {}

  public buildCommitMessage(): string {
    const verb = pickOne(this.random, COMMIT_VERBS);
    return `${verb} daily content: ${formatIsoDate(this.clock())}`;
  }

  /**
   * Stages everything in the working tree, commits and pushes. An empty
   * commit or a rejected push fails the call.
   */
  public async commitAndPush(): Promise<PublishResult> {
    const { gitRemote: remote, gitBranch: branch } = this.config;
    const message = this.buildCommitMessage();

    await this.git.run(['add', '--all']);
    await this.git.run(['commit', '-m', message]);
    console.error(`Committed: ${message}`);

    await this.git.run(['push', remote, branch]);
    console.error(`Pushed to ${remote}/${branch}`);

    return { message, remote, branch };
  }
}
