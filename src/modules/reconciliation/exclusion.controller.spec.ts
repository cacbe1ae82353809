import { ServiceUnavailableException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ExclusionController } from './exclusion.controller';
import { ExclusionService } from './exclusion.service';

describe('ExclusionController', () => {
  let controller: ExclusionController;
  let exclusionService: jest.Mocked<Pick<ExclusionService, 'add' | 'remove'>>;

  beforeEach(async () => {
    exclusionService = { add: jest.fn(), remove: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [ExclusionController],
      providers: [{ provide: ExclusionService, useValue: exclusionService }],
    }).compile();

    controller = module.get<ExclusionController>(ExclusionController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should append a trip id', async () => {
    exclusionService.add.mockResolvedValue({ success: true });

    const response = await controller.create({ trip_id: 'T-1', reason: 'billed manually' });

    expect(exclusionService.add).toHaveBeenCalledWith('T-1', 'billed manually');
    expect(response).toEqual({ success: true, data: { trip_id: 'T-1' } });
  });

  it('should map a failed write to 503', async () => {
    exclusionService.add.mockResolvedValue({ success: false, error: 'connection reset' });
    exclusionService.remove.mockResolvedValue({ success: false, error: 'connection reset' });

    await expect(controller.create({ trip_id: 'T-1' })).rejects.toThrow(ServiceUnavailableException);
    await expect(controller.remove('T-1')).rejects.toThrow(ServiceUnavailableException);
  });

  it('should remove by trimmed trip id', async () => {
    exclusionService.remove.mockResolvedValue({ success: true });

    await controller.remove(' T-1 ');

    expect(exclusionService.remove).toHaveBeenCalledWith('T-1');
  });
});
