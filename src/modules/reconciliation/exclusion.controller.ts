import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ExclusionService } from './exclusion.service';
import { CreateExclusionDto } from './dto/create-exclusion.dto';
import { StoreWriteResult } from '../../utils/diagnostics';

function assertWritten(result: StoreWriteResult): void {
  if (!result.success) {
    throw new ServiceUnavailableException(`Exclusion store write failed: ${result.error}`);
  }
}

/**
 * ExclusionController - pending-CN exclusion list
 */
@Controller('exclusions')
export class ExclusionController {
  constructor(private readonly exclusionService: ExclusionService) {}

  /**
   * GET /api/exclusions
   */
  @Get()
  async findAll() {
    const exclusions = await this.exclusionService.findAll();
    return {
      success: true,
      data: exclusions.map((e) => e.toSafeObject()),
    };
  }

  /**
   * POST /api/exclusions
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() dto: CreateExclusionDto) {
    assertWritten(await this.exclusionService.add(dto.trip_id, dto.reason));
    return {
      success: true,
      data: { trip_id: dto.trip_id },
    };
  }

  /**
   * DELETE /api/exclusions/:tripId
   */
  @Delete(':tripId')
  async remove(@Param('tripId') tripId: string) {
    assertWritten(await this.exclusionService.remove(tripId.trim()));
    return {
      success: true,
      message: 'Exclusion removed',
    };
  }
}
