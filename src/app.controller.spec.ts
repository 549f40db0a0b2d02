import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { CLOCK, SystemClock } from './common/clock/clock';
import { APP_CONFIG, loadConfig } from './config/app.config';
import { InstrumentRegistryService } from './market/instrument-registry.service';

describe('AppController', () => {
  let controller: AppController;
  let module: TestingModule;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        { provide: CLOCK, useClass: SystemClock },
        { provide: APP_CONFIG, useValue: loadConfig({ SEED_SAMPLE_INSTRUMENTS: 'true' }) },
        InstrumentRegistryService,
      ],
    }).compile();
    await module.init();

    controller = module.get<AppController>(AppController);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should report health with the instrument count', () => {
    const health = controller.getHealth();

    expect(health.status).toBe('ok');
    expect(health.service).toBe('stock-metrics');
    expect(health.instruments).toBe(5);
  });

  it('should list the index endpoint', () => {
    expect(controller.getRoot().endpoints.index).toBe('/index');
  });
});
