import { EventEmitter } from 'events';
import { schedule, ScheduledTask } from 'node-cron';
import { Escrow, EscrowLedger, FusionOrder } from '@hashlock-swap/escrow-core';
import { logger } from '../logger';
import { DeadlineAlert, DeadlineAlertType } from '../types';

export interface DeadlineMonitorOptions {
  schedule: string;
  /** How close to a deadline an object must be to raise deadlineApproaching. */
  alertWindowMs: number;
}

/**
 * Watches live escrows and open orders against the ledger clock. Each alert
 * type is raised at most once per object.
 */
export class DeadlineMonitor extends EventEmitter {
  private cronJob: ScheduledTask | null = null;
  private raised = new Map<string, Set<DeadlineAlertType>>();

  constructor(
    private ledger: EscrowLedger,
    private options: DeadlineMonitorOptions
  ) {
    super();
  }

  start(): void {
    if (this.cronJob) {
      return;
    }

    logger.info('Starting deadline monitor...');

    this.cronJob = schedule(this.options.schedule, () => {
      this.runCheck();
    });

    this.runCheck();
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      logger.info('Deadline monitor stopped');
    }
  }

  /** One pass over the ledger. Returns the alerts raised by this pass. */
  checkDeadlines(): DeadlineAlert[] {
    const now = this.ledger.clock.now();
    const alerts: DeadlineAlert[] = [];
    const live = new Set<string>();

    for (const escrow of this.ledger.listEscrows()) {
      live.add(escrow.id);
      const phase = this.ledger.escrowPhase(escrow, now);

      if (phase === 'claimable') {
        this.raise(alerts, this.escrowAlert(escrow, 'claimWindowOpened', escrow.finalitylock, now));

        if (escrow.timelock - now <= this.options.alertWindowMs) {
          this.raise(alerts, this.escrowAlert(escrow, 'deadlineApproaching', escrow.timelock, now));
        }
      }

      if (phase === 'expired') {
        this.raise(alerts, this.escrowAlert(escrow, 'refundAvailable', escrow.timelock, now));
      }
    }

    for (const order of this.ledger.listOrders()) {
      live.add(order.id);
      const remaining = order.core.expiry - now;

      if (remaining > 0 && remaining <= this.options.alertWindowMs) {
        this.raise(alerts, this.orderAlert(order, 'deadlineApproaching', now));
      }

      if (remaining <= 0) {
        this.raise(alerts, this.orderAlert(order, 'orderExpired', now));
      }
    }

    for (const id of this.raised.keys()) {
      if (!live.has(id)) {
        this.raised.delete(id);
      }
    }

    return alerts;
  }

  /** Deadlines falling within the next windowMs, soonest first. */
  getUpcomingDeadlines(windowMs: number = this.options.alertWindowMs): DeadlineAlert[] {
    const now = this.ledger.clock.now();
    const upcoming: DeadlineAlert[] = [];
    const within = (deadline: number): boolean => deadline > now && deadline - now <= windowMs;

    for (const escrow of this.ledger.listEscrows()) {
      if (within(escrow.finalitylock)) {
        upcoming.push(this.escrowAlert(escrow, 'claimWindowOpened', escrow.finalitylock, now));
      }
      if (within(escrow.timelock)) {
        upcoming.push(this.escrowAlert(escrow, 'refundAvailable', escrow.timelock, now));
      }
    }

    for (const order of this.ledger.listOrders()) {
      if (within(order.core.expiry)) {
        upcoming.push(this.orderAlert(order, 'orderExpired', now));
      }
    }

    return upcoming.sort((a, b) => a.timeRemaining - b.timeRemaining);
  }

  async cleanup(): Promise<void> {
    this.stop();
    this.raised.clear();
    this.removeAllListeners();
  }

  private runCheck(): void {
    try {
      this.checkDeadlines();
    } catch (error) {
      logger.error('Error during deadline check:', error);
    }
  }

  private raise(alerts: DeadlineAlert[], alert: DeadlineAlert): void {
    let seen = this.raised.get(alert.subjectId);
    if (!seen) {
      seen = new Set();
      this.raised.set(alert.subjectId, seen);
    }
    if (seen.has(alert.alertType)) {
      return;
    }

    seen.add(alert.alertType);
    alerts.push(alert);
    this.emit(alert.alertType, alert);
  }

  private escrowAlert(
    escrow: Escrow,
    alertType: DeadlineAlertType,
    deadline: number,
    now: number
  ): DeadlineAlert {
    return {
      subjectId: escrow.id,
      subjectAddress: escrow.escrowAddress,
      kind: 'escrow',
      side: escrow.side,
      alertType,
      deadline,
      currentTime: now,
      timeRemaining: deadline - now
    };
  }

  private orderAlert(order: FusionOrder, alertType: DeadlineAlertType, now: number): DeadlineAlert {
    return {
      subjectId: order.id,
      subjectAddress: order.orderAddress,
      kind: 'order',
      alertType,
      deadline: order.core.expiry,
      currentTime: now,
      timeRemaining: order.core.expiry - now
    };
  }
}
