import { Body, Controller, HttpCode, Post, Req, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import { createLogger } from '../../../common/utils/logger';
import { CompareVenuesUseCase } from '../application/use-cases/compare-venues';
import { ValidateVenueUseCase } from '../application/use-cases/validate-venue';
import { CompareVenuesRequestDto } from '../dto/compare-venues-request.dto';
import { ValidateVenueRequestDto } from '../dto/validate-venue-request.dto';
import type {
  CompareVenuesResponseDto,
  ValidateVenueSuccessResponseDto,
} from '../dto/venue-response.dto';

@Controller('api/v1/venues')
export class VenueController {
  private readonly logger = createLogger(VenueController.name);

  constructor(
    private readonly validateVenue: ValidateVenueUseCase,
    private readonly compareVenues: CompareVenuesUseCase,
  ) {}

  @Post('validate')
  @HttpCode(200)
  @UseGuards(ThrottlerGuard)
  validate(
    @Req() request: Request,
    @Body() payload: ValidateVenueRequestDto,
  ): ValidateVenueSuccessResponseDto {
    const requestId = request.requestId ?? randomUUID();

    this.logger.http('venue_validation_received', {
      event: 'venue_validation_received',
      request_id: requestId,
      encoding: payload.encoding ?? 'utf8',
      access_hash: payload.location.accessHash ?? null,
    });

    return this.validateVenue.execute({ requestId, payload });
  }

  @Post('compare')
  @HttpCode(200)
  @UseGuards(ThrottlerGuard)
  compare(@Body() payload: CompareVenuesRequestDto): CompareVenuesResponseDto {
    return this.compareVenues.execute(payload);
  }
}
