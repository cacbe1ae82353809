import { BadRequestException, Body, Controller, Get, Param, Put, ServiceUnavailableException } from '@nestjs/common';
import { TargetService } from './target.service';
import { UpsertTargetDto } from './dto/upsert-target.dto';

/**
 * TargetController - party target store
 *
 * Endpoints:
 * - GET /targets - All stored targets
 * - PUT /targets/:party - Set one party's target
 */
@Controller('targets')
export class TargetController {
  constructor(private readonly targetService: TargetService) {}

  @Get()
  async findAll() {
    const targets = await this.targetService.findAll();
    return {
      success: true,
      data: targets.map((t) => t.toSafeObject()),
    };
  }

  @Put(':party')
  async upsert(@Param('party') party: string, @Body() dto: UpsertTargetDto) {
    const partyName = party.trim();
    if (partyName === '') {
      throw new BadRequestException('party is required');
    }

    const result = await this.targetService.upsert(partyName, dto.target);

    if (!result.success) {
      throw new ServiceUnavailableException(`Target store write failed: ${result.error}`);
    }

    return {
      success: true,
      data: { party_name: partyName, target: dto.target },
    };
  }
}
