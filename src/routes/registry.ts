import { FastifyInstance } from 'fastify';
import { GasPriceService } from '../services/GasPriceService';

// Route imports
import healthRoutes from './health';
import gasPriceRoutes from './gasPrice';

export interface RouteDependencies {
  gasPriceService: GasPriceService;
}

export class RouteRegistry {
  private fastify: FastifyInstance;
  private dependencies: RouteDependencies;

  constructor(fastify: FastifyInstance, dependencies: RouteDependencies) {
    this.fastify = fastify;
    this.dependencies = dependencies;
  }

  async registerAllRoutes(): Promise<void> {
    await this.registerHealthRoutes();
    await this.registerGasPriceRoutes();
  }

  private async registerHealthRoutes(): Promise<void> {
    await this.fastify.register(healthRoutes, {
      prefix: '/health',
      gasPriceService: this.dependencies.gasPriceService
    });
  }

  private async registerGasPriceRoutes(): Promise<void> {
    await this.fastify.register(gasPriceRoutes, {
      prefix: '/gas-price',
      gasPriceService: this.dependencies.gasPriceService
    });
  }
}
