import { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { GasPriceService } from '../services/GasPriceService';

interface HealthPluginOptions extends FastifyPluginOptions {
  gasPriceService: GasPriceService;
}

export default async function healthRoutes(
  fastify: FastifyInstance,
  options: HealthPluginOptions
) {
  const { gasPriceService } = options;

  fastify.get('/', {
    config: {
      rateLimit: false // Health checks should not be rate limited
    }
  }, async () => {
    return { status: 'ok', sources: gasPriceService.sourceNames };
  });
}
