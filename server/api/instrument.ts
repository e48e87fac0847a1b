/**
 * Instrument API Routes
 * REST access to the hosted instrument, for tooling that does not speak raw SCPI
 */

import { Router } from 'express';
import type { ApiError, CommandResponse, InstrumentStatus, PersonalityName } from '../../shared/types.js';
import type { InstrumentSession } from '../scpi/index.js';

export function createInstrumentRoutes(session: InstrumentSession, personality: PersonalityName): Router {
  const router = Router();

  // GET /api/instrument - Identity and status registers (does not clear ESR)
  router.get('/', (_req, res) => {
    const { status, identity } = session.instrument;
    const response: InstrumentStatus = {
      identity,
      personality,
      esr: status.getEsr(),
      sre: status.getSre(),
      stb: status.getStatusByte(),
      errorCount: status.getErrorCount(),
    };
    res.json(response);
  });

  // GET /api/instrument/commands - Resolved command keys in match order
  router.get('/commands', (_req, res) => {
    res.json({ commands: session.getCommandKeys() });
  });

  // POST /api/instrument/command - Execute one SCPI line
  router.post('/command', (req, res) => {
    const body: unknown = req.body;
    const command =
      typeof body === 'object' && body !== null && 'command' in body && typeof body.command === 'string'
        ? body.command.trim()
        : '';

    if (command === '') {
      const error: ApiError = { error: 'INVALID_COMMAND', message: 'Body must contain a non-empty "command" string' };
      res.status(400).json(error);
      return;
    }

    const response: CommandResponse = {
      command,
      response: session.handleCommand(command),
    };
    res.json(response);
  });

  return router;
}
