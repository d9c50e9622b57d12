import { FastifyReply, FastifyRequest } from 'fastify';
import { EstimatedGasPrice } from '../gas/GasPrice';
import { AllSourcesExhaustedError } from '../gas/errors';
import { GasPriceService } from '../services/GasPriceService';
import type { GasPriceJson } from '../types/gasEstimation';
import { Logger } from '../utils/logger';
import { serializeError, summarizeFailures } from '../utils/errors';

export interface GasPriceQuery {
  gasLimit?: number;
  timeLimitMs?: number;
}

export interface BumpBody {
  gasPrice: GasPriceJson;
  factor: number;
  maxCap?: number;
}

export class GasPriceController {
  private readonly logger = new Logger('GasPriceController');

  constructor(private gasPriceService: GasPriceService) {}

  async getGasPrice(
    request: FastifyRequest<{ Querystring: GasPriceQuery }>,
    reply: FastifyReply,
  ) {
    try {
      const quote = await this.gasPriceService.getGasPrice({
        gasLimit: request.query.gasLimit,
        timeLimitMs: request.query.timeLimitMs,
      });
      return reply.send(quote);
    } catch (error) {
      if (error instanceof AllSourcesExhaustedError) {
        this.logger.warn('Every gas price source failed', { failures: summarizeFailures(error) });
        return reply.code(503).send({
          error: 'Gas price unavailable',
          failures: summarizeFailures(error),
        });
      }
      this.logger.error('Error estimating gas price', { error: serializeError(error) });
      return reply.code(500).send({ error: 'Failed to estimate gas price' });
    }
  }

  async bump(request: FastifyRequest<{ Body: BumpBody }>, reply: FastifyReply) {
    const { gasPrice, factor, maxCap } = request.body;
    const bumped = this.gasPriceService.bump(EstimatedGasPrice.fromJSON(gasPrice), {
      factor,
      maxCap,
    });
    return reply.send({
      gasPrice: bumped.toJSON(),
      effectivePrice: bumped.effectivePrice(),
      cap: bumped.cap(),
    });
  }
}
