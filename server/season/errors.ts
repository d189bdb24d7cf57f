/**
 * Raised when season phase data is malformed: bad dates, start after end,
 * unsorted or overlapping phases. The offending season is never registered.
 */
export class InvalidSeasonConfig extends Error {
  readonly status = 500;

  constructor(message: string) {
    super(message);
    this.name = "InvalidSeasonConfig";
  }
}

export class SeasonNotFound extends Error {
  readonly status = 404;

  constructor(
    readonly sport: string,
    readonly year?: number,
  ) {
    super(
      year === undefined
        ? `No seasons registered for ${sport}`
        : `No season ${year} registered for ${sport}`,
    );
    this.name = "SeasonNotFound";
  }
}

