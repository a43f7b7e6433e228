import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('should report healthy', () => {
    const health = controller.getHealth();

    expect(health.status).toBe('ok');
    expect(health.service).toBe('holdings-ledger');
    expect(new Date(health.timestamp).toISOString()).toBe(health.timestamp);
  });

  it('should list the holdings endpoints', () => {
    expect(controller.getRoot().endpoints).toMatchObject({
      update: '/holdings/update',
      snapshot: '/holdings/snapshot',
      export: '/holdings/export',
    });
  });
});
