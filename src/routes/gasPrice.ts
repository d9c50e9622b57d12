import { FastifyInstance } from 'fastify';
import {
  GasPriceController,
  type BumpBody,
  type GasPriceQuery,
} from '../controllers/GasPriceController';
import { GasPriceService } from '../services/GasPriceService';
import { bumpBodySchema, gasPriceQuerySchema } from '../schemas/gasPrice';

export default async function gasPriceRoutes(
  fastify: FastifyInstance,
  options: { gasPriceService: GasPriceService },
) {
  const controller = new GasPriceController(options.gasPriceService);

  fastify.get<{ Querystring: GasPriceQuery }>('/', {
    schema: {
      querystring: gasPriceQuerySchema,
    },
    handler: controller.getGasPrice.bind(controller),
  });

  fastify.post<{ Body: BumpBody }>('/bump', {
    schema: {
      body: bumpBodySchema,
    },
    handler: controller.bump.bind(controller),
  });
}
