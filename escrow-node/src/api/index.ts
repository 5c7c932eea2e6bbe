import express from 'express';
import {
  CallContext,
  deriveEscrowAddress,
  ESCROW_EVENT_NAMES,
  EscrowErrorCode,
  EscrowEventName,
  EscrowLedger,
  EscrowSide,
  isEscrowError
} from '@hashlock-swap/escrow-core';
import { ActivityJournal } from '../database';
import { logger } from '../logger';
import { DeadlineMonitor } from '../services/monitor';
import { RequestValidator } from '../services/validator';
import { NodeConfig, NodeStatus } from '../types';
import {
  serializeBalances,
  serializeEscrow,
  serializeEscrowSettlement,
  serializeOrder,
  serializeOrderSettlement
} from './serializers';

const STATUS_BY_CODE: Record<EscrowErrorCode, number> = {
  NOT_FOUND: 404,
  NOT_RESOLVER: 403,
  NOT_MAKER: 403,
  INVALID_RESOLVER: 403,
  UNAUTHORIZED_CREATOR: 403,
  NOT_FACTORY_OWNER: 403,
  INVALID_ADDRESS: 400,
  INVALID_AMOUNT: 400,
  INVALID_HASHLOCK: 400,
  INVALID_ROUTE_DATA: 400,
  INVALID_TIMELOCK: 400,
  INVALID_SECRET: 400,
  ASSET_MISMATCH: 400,
  INSUFFICIENT_DEPOSIT: 409,
  INSUFFICIENT_BALANCE: 409,
  INSUFFICIENT_OUTPUT: 409,
  ORDER_EXPIRED: 409,
  ORDER_NOT_EXPIRED: 409,
  ALREADY_RESOLVED: 409,
  ALREADY_CLAIMED: 409,
  TIMELOCKED: 409,
  TIMELOCK_NOT_EXPIRED: 409,
  FINALITY_LOCK_ACTIVE: 409,
  DUPLICATE_ESCROW: 409,
  WRONG_ESCROW_SIDE: 409
};

export const CALLER_HEADER = 'x-caller-address';

function isEventName(value: unknown): value is EscrowEventName {
  return ESCROW_EVENT_NAMES.some((name) => name === value);
}

function positiveInt(value: unknown, fallback: number): number {
  const parsed = typeof value === 'string' ? parseInt(value) : NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export async function collectStatus(
  ledger: EscrowLedger,
  journal: ActivityJournal,
  monitor: DeadlineMonitor,
  config: NodeConfig,
  node: NodeStatus['node']
): Promise<NodeStatus> {
  return {
    node,
    liveEscrows: ledger.listEscrows().length,
    openOrders: ledger.listOrders().length,
    journalEntries: await journal.count(),
    upcomingDeadlines: monitor.getUpcomingDeadlines().length,
    config: {
      allowMint: config.allowMint,
      alertWindowMs: config.alertWindowMs,
      nativeAsset: ledger.config.nativeAsset,
      finalityPeriodMs: ledger.config.finalityPeriodMs,
      defaultTimelockMs: ledger.config.defaultTimelockMs,
      fusionResolverPolicy: ledger.config.fusionResolverPolicy
    }
  };
}

export function createAPI(
  ledger: EscrowLedger,
  journal: ActivityJournal,
  monitor: DeadlineMonitor,
  validator: RequestValidator,
  config: NodeConfig
): express.Application {
  const app = express();

  app.use(express.json());

  app.use((req, res, next) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || authHeader !== `Bearer ${config.apiSecret}`) {
      return res.status(401).json({ error: 'Unauthorized' });
    }
    next();
  });

  /** Caller identity for state-changing routes, or null once a 400 has been sent. */
  function requireCaller(req: express.Request, res: express.Response): CallContext | null {
    const sender = req.header(CALLER_HEADER);
    if (!sender || !validator.isValidAddress(sender)) {
      res.status(400).json({
        error: 'Invalid caller',
        message: 'X-Caller-Address header must carry a 20-byte hex address'
      });
      return null;
    }
    return { sender };
  }

  function invalid(res: express.Response, errors: string[]) {
    return res.status(400).json({ error: 'Invalid request', details: errors });
  }

  app.post('/accounts/:address/mint', (req, res) => {
    if (!config.allowMint) {
      return res.status(403).json({ error: 'Minting is disabled' });
    }

    const validation = validator.validateMint(req.body);
    if (!validation.valid) {
      return invalid(res, validation.errors);
    }

    const { asset, amount } = validation.value;
    ledger.mint(req.params.address, asset, amount);

    res.status(201).json({
      success: true,
      balances: serializeBalances(ledger.balancesOf(req.params.address))
    });
  });

  app.get('/accounts/:address/balances', (req, res) => {
    res.json({
      success: true,
      address: req.params.address,
      balances: serializeBalances(ledger.balancesOf(req.params.address))
    });
  });

  function createEscrow(side: EscrowSide): express.RequestHandler {
    return (req, res) => {
      const ctx = requireCaller(req, res);
      if (!ctx) return;

      const validation = validator.validateEscrowRequest(req.body);
      if (!validation.valid) {
        return invalid(res, validation.errors);
      }

      const escrow = side === 'source'
        ? ledger.createSourceEscrow(ctx, validation.value)
        : ledger.createDestinationEscrow(ctx, validation.value);

      res.status(201).json({
        success: true,
        escrow: serializeEscrow(escrow, ledger.escrowPhase(escrow))
      });
    };
  }

  app.post('/escrows/source', createEscrow('source'));
  app.post('/escrows/destination', createEscrow('destination'));

  app.get('/escrows', (req, res) => {
    const { side } = req.query;
    const escrows = ledger.listEscrows().filter((escrow) => !side || escrow.side === side);

    res.json({
      success: true,
      escrows: escrows.map((escrow) => serializeEscrow(escrow, ledger.escrowPhase(escrow)))
    });
  });

  app.get('/escrows/:id', (req, res) => {
    const escrow = ledger.getEscrow(req.params.id);

    res.json({
      success: true,
      escrow: serializeEscrow(escrow, ledger.escrowPhase(escrow))
    });
  });

  app.post('/escrows/:id/claim', (req, res) => {
    const ctx = requireCaller(req, res);
    if (!ctx) return;

    const validation = validator.validateClaim(req.body);
    if (!validation.valid) {
      return invalid(res, validation.errors);
    }

    const settlement = ledger.claim(ctx, req.params.id, validation.value.secret);
    res.json({ success: true, settlement: serializeEscrowSettlement(settlement) });
  });

  app.post('/escrows/:id/refund', (req, res) => {
    const ctx = requireCaller(req, res);
    if (!ctx) return;

    const settlement = ledger.refund(ctx, req.params.id);
    res.json({ success: true, settlement: serializeEscrowSettlement(settlement) });
  });

  app.post('/escrows/:id/slash', (req, res) => {
    const ctx = requireCaller(req, res);
    if (!ctx) return;

    const settlement = ledger.slash(ctx, req.params.id);
    res.json({ success: true, settlement: serializeEscrowSettlement(settlement) });
  });

  app.post('/orders', (req, res) => {
    const ctx = requireCaller(req, res);
    if (!ctx) return;

    const validation = validator.validateOrderRequest(req.body);
    if (!validation.valid) {
      return invalid(res, validation.errors);
    }

    const order = ledger.createOrder(ctx, validation.value);
    res.status(201).json({ success: true, order: serializeOrder(order) });
  });

  app.get('/orders', (req, res) => {
    res.json({ success: true, orders: ledger.listOrders().map(serializeOrder) });
  });

  app.get('/orders/:id', (req, res) => {
    res.json({ success: true, order: serializeOrder(ledger.getOrder(req.params.id)) });
  });

  app.post('/orders/:id/resolve', (req, res) => {
    const ctx = requireCaller(req, res);
    if (!ctx) return;

    const validation = validator.validateResolve(req.body);
    if (!validation.valid) {
      return invalid(res, validation.errors);
    }

    const settlement = ledger.resolveOrder(ctx, req.params.id, validation.value.proceeds);
    res.json({ success: true, settlement: serializeOrderSettlement(settlement) });
  });

  app.post('/orders/:id/cancel', (req, res) => {
    const ctx = requireCaller(req, res);
    if (!ctx) return;

    const settlement = ledger.cancelOrder(ctx, req.params.id);
    res.json({ success: true, settlement: serializeOrderSettlement(settlement) });
  });

  app.post('/identifiers/derive', (req, res) => {
    const validation = validator.validateDerive(req.body);
    if (!validation.valid) {
      return invalid(res, validation.errors);
    }

    const { order, role } = validation.value;
    res.json({ success: true, role, address: deriveEscrowAddress(order, role) });
  });

  app.get('/activity', async (req, res, next) => {
    try {
      const { subjectId, event } = req.query;
      const activity = await journal.list({
        subjectId: typeof subjectId === 'string' ? subjectId : undefined,
        event: isEventName(event) ? event : undefined,
        limit: positiveInt(req.query.limit, 100)
      });

      res.json({ success: true, activity });
    } catch (error) {
      next(error);
    }
  });

  app.get('/status', async (req, res, next) => {
    try {
      const status = await collectStatus(ledger, journal, monitor, config, 'running');
      res.json({ success: true, status });
    } catch (error) {
      next(error);
    }
  });

  app.get('/deadlines', (req, res) => {
    const windowMs = positiveInt(req.query.window, config.alertWindowMs);
    res.json({ success: true, deadlines: monitor.getUpcomingDeadlines(windowMs) });
  });

  app.use((error: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (isEscrowError(error)) {
      return res.status(STATUS_BY_CODE[error.code]).json({
        error: 'Escrow operation rejected',
        code: error.code,
        message: error.message
      });
    }

    if (error instanceof SyntaxError) {
      return res.status(400).json({
        error: 'Invalid request',
        code: 'MALFORMED_JSON',
        message: error.message
      });
    }

    logger.error('Unhandled API error:', error);
    res.status(500).json({
      error: 'Internal server error',
      code: 'INTERNAL',
      message: error instanceof Error ? error.message : 'Unknown error'
    });
  });

  return app;
}
