export { CompareVenuesUseCase } from './compare-venues.use-case';
