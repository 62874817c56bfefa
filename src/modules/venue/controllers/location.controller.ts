import { Body, Controller, HttpCode, Post, Req, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import { NormalizeLocationUseCase } from '../application/use-cases/normalize-location';
import { LocationInputDto } from '../dto/location-input.dto';
import type { NormalizeLocationResponseDto } from '../dto/venue-response.dto';

@Controller('api/v1/locations')
export class LocationController {
  constructor(private readonly normalizeLocation: NormalizeLocationUseCase) {}

  @Post('normalize')
  @HttpCode(200)
  @UseGuards(ThrottlerGuard)
  normalize(
    @Req() request: Request,
    @Body() payload: LocationInputDto,
  ): NormalizeLocationResponseDto {
    return this.normalizeLocation.execute({
      requestId: request.requestId ?? randomUUID(),
      payload,
    });
  }
}
