const numberFormatter = new Intl.NumberFormat('en-US');

/** Thousands-grouped count, or a dash when the value is missing. */
export const formatNumber = (value: number | undefined) =>
  typeof value === 'number' && Number.isFinite(value) ? numberFormatter.format(value) : '—';
