export { NormalizeLocationUseCase, buildLocation } from './normalize-location.use-case';
