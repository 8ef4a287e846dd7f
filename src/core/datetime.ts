/**
 * strptime-style Date Parsing
 *
 * Design decisions:
 * - A format string is compiled once into an anchored, case-insensitive RegExp
 * - Each directive owns one capture group; parsing is a single exec()
 * - Whitespace in the format matches one or more whitespace characters
 * - Results are validated by round-tripping through Date.UTC (no Feb 30)
 * - Without %z the fields are read as UTC
 *
 * Supported directives: %Y %y %m %d %H %I %p %M %S %f %z %Z %j %b %B %h %a %A %%
 */

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];
const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

const MONTH_ABBR = MONTHS.map((m) => m.slice(0, 3));
const WEEKDAY_ABBR = WEEKDAYS.map((d) => d.slice(0, 3));

function alternation(words: readonly string[]): string {
  // Longest first so "june" is not cut short by "jun"
  return '(' + [...words].sort((a, b) => b.length - a.length).join('|') + ')';
}

const DIRECTIVES: Readonly<Record<string, string>> = {
  Y: '(\\d{4})',
  y: '(\\d\\d)',
  m: '(1[0-2]|0[1-9]|[1-9])',
  d: '(3[01]|[12]\\d|0[1-9]|[1-9]| [1-9])',
  H: '(2[0-3]|[0-1]\\d|\\d)',
  I: '(1[0-2]|0[1-9]|[1-9])',
  p: '(am|pm)',
  M: '([0-5]\\d|\\d)',
  S: '(6[0-1]|[0-5]\\d|\\d)',
  f: '(\\d{1,6})',
  z: '(Z|[+-]\\d\\d:?[0-5]\\d)',
  Z: '(UTC|GMT|Z)',
  j: '(36[0-6]|3[0-5]\\d|[12]\\d\\d|0[1-9]\\d|00[1-9]|[1-9]\\d|0[1-9]|[1-9])',
  b: alternation(MONTH_ABBR),
  h: alternation(MONTH_ABBR),
  B: alternation(MONTHS),
  a: alternation(WEEKDAY_ABBR),
  A: alternation(WEEKDAYS),
};

export interface CompiledFormat {
  readonly format: string;
  parse(input: string): Date | null;
}

interface Fields {
  year: number;
  month: number;
  day: number;
  hour: number;
  hour12: number | null;
  pm: boolean | null;
  minute: number;
  second: number;
  millisecond: number;
  yday: number | null;
  offsetMinutes: number;
}

function escapeLiteral(ch: string): string {
  return /[.*+?^${}()|[\]\\]/.test(ch) ? '\\' + ch : ch;
}

function parseOffset(text: string): number {
  if (text === 'Z' || text === 'z') return 0;
  const sign = text[0] === '-' ? -1 : 1;
  const digits = text.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

function apply(fields: Fields, directive: string, text: string): void {
  switch (directive) {
    case 'Y':
      fields.year = Number(text);
      break;
    case 'y': {
      const yy = Number(text);
      fields.year = yy <= 68 ? 2000 + yy : 1900 + yy;
      break;
    }
    case 'm':
      fields.month = Number(text);
      break;
    case 'd':
      fields.day = Number(text.trim());
      break;
    case 'H':
      fields.hour = Number(text);
      break;
    case 'I':
      fields.hour12 = Number(text);
      break;
    case 'p':
      fields.pm = text.toLowerCase() === 'pm';
      break;
    case 'M':
      fields.minute = Number(text);
      break;
    case 'S':
      fields.second = Number(text);
      break;
    case 'f':
      fields.millisecond = Math.floor(Number(text.padEnd(6, '0')) / 1000);
      break;
    case 'z':
      fields.offsetMinutes = parseOffset(text);
      break;
    case 'j':
      fields.yday = Number(text);
      break;
    case 'b':
    case 'h':
      fields.month = MONTH_ABBR.indexOf(text.toLowerCase()) + 1;
      break;
    case 'B':
      fields.month = MONTHS.indexOf(text.toLowerCase()) + 1;
      break;
    // %Z, %a and %A are matched but carry no information we keep
  }
}

function build(fields: Fields): Date | null {
  let hour = fields.hour;
  if (fields.hour12 !== null) {
    hour = fields.hour12 % 12;
    if (fields.pm === true) hour += 12;
  }

  let month = fields.month;
  let day = fields.day;
  if (fields.yday !== null) {
    const jan1 = Date.UTC(fields.year, 0, 1);
    const date = new Date(jan1 + (fields.yday - 1) * 86_400_000);
    if (date.getUTCFullYear() !== fields.year) return null;
    month = date.getUTCMonth() + 1;
    day = date.getUTCDate();
  }

  const ms = Date.UTC(fields.year, month - 1, day, hour, fields.minute, fields.second, fields.millisecond);
  const check = new Date(ms);
  // Date.UTC maps years 0-99 onto 1900-1999
  check.setUTCFullYear(fields.year);
  if (
    check.getUTCFullYear() !== fields.year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== fields.minute ||
    check.getUTCSeconds() !== fields.second
  ) {
    return null;
  }

  return new Date(check.getTime() - fields.offsetMinutes * 60_000);
}

/**
 * Compile a strptime format string.
 * Throws a plain Error for an unknown directive; callers wrap it.
 */
export function compileFormat(format: string): CompiledFormat {
  const directives: string[] = [];
  let source = '^';

  for (let i = 0; i < format.length; i++) {
    const ch = format[i];
    if (ch === '%') {
      const directive = format[++i];
      if (directive === undefined) {
        throw new Error(`stray "%" at the end of format "${format}"`);
      }
      if (directive === '%') {
        source += '%';
        continue;
      }
      const group = DIRECTIVES[directive];
      if (group === undefined) {
        throw new Error(`unsupported directive "%${directive}" in format "${format}"`);
      }
      directives.push(directive);
      source += group;
    } else if (/\s/.test(ch)) {
      while (i + 1 < format.length && /\s/.test(format[i + 1])) i++;
      source += '\\s+';
    } else {
      source += escapeLiteral(ch);
    }
  }

  const regex = new RegExp(source + '$', 'i');

  return {
    format,
    parse(input: string): Date | null {
      const match = regex.exec(input);
      if (match === null) return null;

      const fields: Fields = {
        year: 1900,
        month: 1,
        day: 1,
        hour: 0,
        hour12: null,
        pm: null,
        minute: 0,
        second: 0,
        millisecond: 0,
        yday: null,
        offsetMinutes: 0,
      };

      for (let i = 0; i < directives.length; i++) {
        apply(fields, directives[i], match[i + 1]);
      }

      return build(fields);
    },
  };
}
