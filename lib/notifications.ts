import { NotificationError, errorMessage } from './errors';
import { createLogger } from './logging';
import type { DeploymentSummary, NotificationEvent } from './models';
import { isSpawnNotFound, runCommand } from './process';

const logger = createLogger('notifications');

/**
 * Best-effort delivery of deployment outcomes. Implementations must never
 * reject: a failed send is logged and dropped.
 */
export interface NotificationTrigger {
  notify(urls: string[], event: NotificationEvent, summary: DeploymentSummary, options?: NotifyOptions): Promise<void>;
}

export interface NotifyOptions {
  // Aborting kills sends still in flight
  signal?: AbortSignal;
}

export function formatMessage(event: NotificationEvent, summary: DeploymentSummary): string {
  const commit = summary.commitHash ? summary.commitHash.slice(0, 7) : 'unknown';
  const duration = summary.durationSeconds === null ? '?' : summary.durationSeconds.toFixed(1);
  let message =
    `stackpilot ${event.toUpperCase()} - ${summary.projectName}/${summary.repositoryName} ` +
    `status=${summary.status} commit=${commit} duration=${duration}s deployment_id=${summary.deploymentId}`;
  if (summary.error) {
    message += `\n${summary.error}`;
  }
  return message;
}

/**
 * Sends through the `shoutrrr` CLI, which understands service URLs such as
 * `discord://token@id` or `telegram://token@telegram?chats=...`.
 */
export class ShoutrrrNotifier implements NotificationTrigger {
  private binaryMissing = false;

  constructor(private binary: string = 'shoutrrr') {}

  async notify(
    urls: string[],
    event: NotificationEvent,
    summary: DeploymentSummary,
    options: NotifyOptions = {},
  ): Promise<void> {
    if (urls.length === 0 || this.binaryMissing) return;

    const message = formatMessage(event, summary);
    logger.info(`Sending ${event} notification for deployment ${summary.deploymentId} to ${urls.length} target(s)`);

    await Promise.all(
      urls.map(async (url) => {
        try {
          await this.send(url, message, options.signal);
        } catch (error) {
          logger.warn(errorMessage(error));
        }
      }),
    );
  }

  private async send(url: string, message: string, signal?: AbortSignal): Promise<void> {
    let exitCode: number;
    let stderr: string;
    try {
      ({ exitCode, stderr } = await runCommand(this.binary, ['send', '-u', url, '-m', message], { signal }));
    } catch (error) {
      if (isSpawnNotFound(error)) {
        this.binaryMissing = true;
        throw new NotificationError(`${this.binary} executable not found, notifications disabled`);
      }
      throw new NotificationError(`Failed to run ${this.binary}: ${errorMessage(error)}`);
    }
    if (exitCode !== 0) {
      // The URL embeds credentials, only its scheme is logged
      throw new NotificationError(`${this.binary} failed for a ${url.split(':')[0]} target: ${stderr.trim()}`, url);
    }
  }
}
