/** Calendar date in `YYYY-MM-DD` form, always interpreted as UTC midnight. */
export type DateString = `${number}-${number}-${number}`;

export type DateDisplayFormat = 'YYYY-MM-DD' | 'MM/DD/YYYY' | 'DD/MM/YYYY';

export type MonthBounds = {
  startOfMonth: Date;
  endOfMonth: Date;
};
