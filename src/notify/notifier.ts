/**
 * Notification collaborator for key expiry and rotation.
 * Delivery (email, webhooks) lives outside this package.
 */

import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import type { RotationTrigger } from '../core/types.js';

export type ExpiryLevel = 'warning' | 'urgent' | 'critical' | 'expired';

export interface ExpiryNotice {
  recordId: string;
  keyId: string;
  keyName: string;
  ownerId: string;
  level: ExpiryLevel;
  daysUntilExpiry: number;
  expiresAt: string;
  suggestedActions: string[];
}

export interface RotationNotice {
  ownerId: string;
  keyName: string;
  oldKeyId: string;
  newKeyId: string;
  trigger: RotationTrigger;
  immediate: boolean;
  transitionDays: number;
  message: string;
}

export interface Notifier {
  notifyExpiring(notice: ExpiryNotice): Promise<void>;
  notifyRotated(notice: RotationNotice): Promise<void>;
}

/** Writes notices to the structured log. */
export class LoggingNotifier implements Notifier {
  constructor(private readonly log: Logger = createLogger('notifier')) {}

  async notifyExpiring(notice: ExpiryNotice): Promise<void> {
    this.log.info('Key expiry notice', { ...notice });
  }

  async notifyRotated(notice: RotationNotice): Promise<void> {
    this.log.info('Key rotation notice', { ...notice });
  }
}

/** Collects notices in memory. */
export class MemoryNotifier implements Notifier {
  readonly expiring: ExpiryNotice[] = [];
  readonly rotated: RotationNotice[] = [];

  async notifyExpiring(notice: ExpiryNotice): Promise<void> {
    this.expiring.push(notice);
  }

  async notifyRotated(notice: RotationNotice): Promise<void> {
    this.rotated.push(notice);
  }
}
