import { capacityProviderStrategies } from '../../lib/constructs/n8n-service.js';

describe('capacityProviderStrategies', () => {
  test('on-demand only carries the base task', () => {
    expect(capacityProviderStrategies(0)).toEqual([
      { capacityProvider: 'FARGATE', weight: 100, base: 1 },
    ]);
  });

  test('Spot only carries the base task itself', () => {
    expect(capacityProviderStrategies(100)).toEqual([
      { capacityProvider: 'FARGATE_SPOT', weight: 100, base: 1 },
    ]);
  });

  test('mixed capacity keeps the base task on demand', () => {
    expect(capacityProviderStrategies(80)).toEqual([
      { capacityProvider: 'FARGATE', weight: 20, base: 1 },
      { capacityProvider: 'FARGATE_SPOT', weight: 80 },
    ]);
  });
});
