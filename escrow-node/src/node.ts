import type { Server } from 'http';
import { EscrowLedger, TrustedClock } from '@hashlock-swap/escrow-core';
import { collectStatus, createAPI } from './api';
import { ActivityJournal } from './database';
import { logger } from './logger';
import { DeadlineMonitor } from './services/monitor';
import { RequestValidator } from './services/validator';
import { DeadlineAlert, NodeConfig, NodeStatus } from './types';
import { loadConfig } from './utils/config';

export class EscrowNode {
  private ledger!: EscrowLedger;
  private journal!: ActivityJournal;
  private monitor!: DeadlineMonitor;
  private validator!: RequestValidator;
  private detachJournal: (() => void) | null = null;
  private server: Server | null = null;

  constructor(
    private readonly config: NodeConfig = loadConfig(),
    private readonly clock?: TrustedClock
  ) {}

  async initialize(): Promise<void> {
    logger.info('Initializing hashlock-swap escrow node...');

    this.ledger = new EscrowLedger({ config: this.config.escrow, clock: this.clock });

    this.journal = new ActivityJournal();
    await this.journal.initialize(this.config.dbPath);
    this.detachJournal = this.journal.attach(this.ledger.events);

    this.validator = new RequestValidator();

    this.monitor = new DeadlineMonitor(this.ledger, {
      schedule: this.config.monitorSchedule,
      alertWindowMs: this.config.alertWindowMs
    });

    this.setupEventHandlers();

    logger.info('Escrow node initialization complete');
  }

  private setupEventHandlers(): void {
    const events = this.ledger.events;

    events.subscribe('escrowCreated', (event) => {
      logger.info(`🏗️  ${event.side} escrow ${event.id} locked ${event.amount} for ${event.resolver}`);
    });

    events.subscribe('escrowClaimed', (event) => {
      logger.info(`🔓 Secret revealed on ${event.side} escrow ${event.id}: ${event.secret}`);
    });

    events.subscribe('escrowRefunded', (event) => {
      logger.info(`↩️  Source escrow ${event.id} refunded to ${event.maker}`);
    });

    events.subscribe('escrowSlashed', (event) => {
      logger.info(`⚔️  Destination escrow ${event.id} returned to ${event.resolver}`);
    });

    events.subscribe('orderFilled', (event) => {
      logger.info(`✅ Fusion order ${event.id} filled by ${event.filledBy} for ${event.proceeds}`);
    });

    this.monitor.on('claimWindowOpened', (alert: DeadlineAlert) => {
      logger.info(`🔔 Claim window open for ${alert.side} escrow ${alert.subjectId}`);
    });

    this.monitor.on('deadlineApproaching', (alert: DeadlineAlert) => {
      logger.warn(`⏰ Deadline approaching for ${alert.kind} ${alert.subjectId} in ${alert.timeRemaining}ms`);
    });

    this.monitor.on('refundAvailable', (alert: DeadlineAlert) => {
      logger.warn(`🚨 Timelock passed for ${alert.side} escrow ${alert.subjectId}; timeout path is open`);
    });

    this.monitor.on('orderExpired', (alert: DeadlineAlert) => {
      logger.warn(`❌ Fusion order ${alert.subjectId} expired; maker may cancel`);
    });
  }

  async start(): Promise<void> {
    logger.info('Starting escrow node services...');

    this.monitor.start();

    const app = createAPI(this.ledger, this.journal, this.monitor, this.validator, this.config);

    this.server = app.listen(this.config.port, () => {
      logger.info(`🚀 Escrow node API listening on port ${this.config.port}`);
      logger.info(`📊 Status endpoint: http://localhost:${this.config.port}/status`);
    });
  }

  async stop(): Promise<void> {
    logger.info('Stopping escrow node services...');

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }

    this.detachJournal?.();
    this.detachJournal = null;

    await Promise.all([
      this.monitor?.cleanup(),
      this.journal?.close()
    ]);

    logger.info('✅ Escrow node stopped');
  }

  async getStatus(): Promise<NodeStatus> {
    return collectStatus(
      this.ledger,
      this.journal,
      this.monitor,
      this.config,
      this.server ? 'running' : 'stopped'
    );
  }

  getLedger(): EscrowLedger {
    return this.ledger;
  }
}

export async function main(): Promise<void> {
  const node = new EscrowNode();

  const shutdown = (signal: string) => {
    logger.info(`🛑 Received ${signal}, shutting down gracefully...`);
    node.stop()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Failed to stop cleanly:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await node.initialize();
  await node.start();
}

if (require.main === module) {
  main().catch((error) => {
    logger.error('❌ Fatal error:', error);
    process.exit(1);
  });
}

export default EscrowNode;
