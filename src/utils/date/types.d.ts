export type DateString = `${number}-${number}-${number}`;

export type StatementPeriodLabel = `${DateString}_to_${DateString}`;

export type StatementPeriodRange = {
  start: Date;
  end: Date;
};
