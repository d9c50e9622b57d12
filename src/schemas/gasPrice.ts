const wei = { type: 'number', minimum: 0 } as const;

export const dynamicFeeSchema = {
  type: 'object',
  properties: {
    baseFeePerGas: wei,
    maxFeePerGas: wei,
    maxPriorityFeePerGas: wei,
  },
  required: ['baseFeePerGas', 'maxFeePerGas', 'maxPriorityFeePerGas'],
  additionalProperties: false,
} as const;

export const gasPriceSchema = {
  type: 'object',
  properties: {
    legacy: wei,
    eip1559: dynamicFeeSchema,
  },
  required: ['legacy'],
  additionalProperties: false,
} as const;

export const gasPriceQuerySchema = {
  type: 'object',
  properties: {
    gasLimit: { type: 'integer', minimum: 1, maximum: 100_000_000 },
    timeLimitMs: { type: 'integer', minimum: 100, maximum: 600_000 },
  },
  additionalProperties: false,
} as const;

export const bumpBodySchema = {
  type: 'object',
  properties: {
    gasPrice: gasPriceSchema,
    factor: { type: 'number', exclusiveMinimum: 0, maximum: 100 },
    maxCap: wei,
  },
  required: ['gasPrice', 'factor'],
  additionalProperties: false,
} as const;
