const pad = (value: number) => value.toString().padStart(2, '0');

const dateParts = (date: Date) => ({
  year: date.getFullYear().toString().padStart(4, '0'),
  month: pad(date.getMonth() + 1),
  day: pad(date.getDate()),
  hours: pad(date.getHours()),
  minutes: pad(date.getMinutes()),
  seconds: pad(date.getSeconds()),
});

/** `YYYY-MM-DD HH:MM:SS` in local time, as stored in catalog locations. */
export const formatCatalogTimestamp = (date: Date): string => {
  const { year, month, day, hours, minutes, seconds } = dateParts(date);
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
};

/** `YYYY-MM-DD_HH-MM-SS` in local time, used as the suffix of backup documents. */
export const formatBackupStamp = (date: Date): string => {
  const { year, month, day, hours, minutes, seconds } = dateParts(date);
  return `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
};
