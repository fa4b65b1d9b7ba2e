export type ResolvedDay = {
  /** Local calendar day, YYYY-MM-DD */
  day: string;
  /** Date expression that set the day; absent when defaulted to today */
  expression?: string;
};

export type RelativeDayLabel = 'TODAY' | 'TOMORROW';
