import { Module } from '@nestjs/common';
import { CompareVenuesUseCase } from './application/use-cases/compare-venues';
import { NormalizeLocationUseCase } from './application/use-cases/normalize-location';
import { ValidateVenueUseCase } from './application/use-cases/validate-venue';
import { LocationController } from './controllers/location.controller';
import { VenueController } from './controllers/venue.controller';

@Module({
  controllers: [VenueController, LocationController],
  providers: [ValidateVenueUseCase, NormalizeLocationUseCase, CompareVenuesUseCase],
})
export class VenueModule {}
