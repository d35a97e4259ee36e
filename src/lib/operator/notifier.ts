import { spawn } from 'node:child_process';

import { getLogger } from '../logger.js';
import type { Notifier } from '../pairing/types.js';

const log = getLogger('Notifier');

const NOTIFY_COMMAND = 'notify-send';

/** Raises a desktop notification through `notify-send` without waiting for it */
export class CommandNotifier implements Notifier {
  constructor(
    private readonly command: string = NOTIFY_COMMAND,
    private readonly appName: string = 'Media relay',
  ) {}

  notify(title: string, body: string): void {
    const child = spawn(this.command, [`--app-name=${this.appName}`, title, body], {
      stdio: 'ignore',
    });
    child.once('error', (error) => {
      log.debug(`Notification not shown: ${error.message}`);
    });
    child.unref();
  }
}

export class NullNotifier implements Notifier {
  notify(): void {}
}
