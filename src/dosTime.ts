export interface DosDateTime {
  time: number;
  date: number;
}

const MIN_YEAR = 1980;
const MAX_YEAR = 2107;

/** Pack a local-time Date into MS-DOS date/time words (2-second resolution). */
export function dateToDos(date: Date): DosDateTime {
  const year = date.getFullYear();
  if (year < MIN_YEAR) {
    // 1980-01-01 00:00:00, the format's epoch.
    return { time: 0, date: (1 << 5) | 1 };
  }
  if (year > MAX_YEAR) {
    return {
      time: (23 << 11) | (59 << 5) | 29,
      date: ((MAX_YEAR - MIN_YEAR) << 9) | (12 << 5) | 31
    };
  }
  const month = date.getMonth() + 1;
  const day = date.getDate();
  const hours = date.getHours();
  const minutes = date.getMinutes();
  const seconds = Math.floor(date.getSeconds() / 2);

  const dosTime = (hours << 11) | (minutes << 5) | seconds;
  const dosDate = ((year - MIN_YEAR) << 9) | (month << 5) | day;

  return { time: dosTime & 0xffff, date: dosDate & 0xffff };
}

export function dosToDate(time: number, date: number): Date {
  const day = date & 0x1f;
  const month = (date >> 5) & 0x0f;
  const year = ((date >> 9) & 0x7f) + MIN_YEAR;

  const second = (time & 0x1f) * 2;
  const minute = (time >> 5) & 0x3f;
  const hour = (time >> 11) & 0x1f;

  return new Date(year, month - 1, day, hour, minute, second);
}
