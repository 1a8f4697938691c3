export type TourErrorCode =
  | 'invalid_city'
  | 'empty_city_collection'
  | 'duplicate_city_id'
  | 'unknown_start_city';

/** Precondition failures raised before a tour is built. */
export abstract class TourDomainError extends Error {
  abstract readonly code: TourErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCityError extends TourDomainError {
  readonly code = 'invalid_city' as const;
}

export class EmptyCityCollectionError extends TourDomainError {
  readonly code = 'empty_city_collection' as const;

  constructor() {
    super('city collection is empty');
  }
}

export class DuplicateCityIdError extends TourDomainError {
  readonly code = 'duplicate_city_id' as const;

  constructor(readonly cityId: number) {
    super(`city id ${cityId} appears more than once`);
  }
}

export class UnknownStartCityError extends TourDomainError {
  readonly code = 'unknown_start_city' as const;

  constructor(readonly startId: number) {
    super(`no city with id ${startId}`);
  }
}
