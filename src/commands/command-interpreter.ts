import { LocalDateRange } from '../common/types';
import {
  LocalDate,
  addDays,
  lastDayOfMonth,
  parseLocalDate,
  weekdayOf,
} from '../common/zoned-time';

export interface LocalDateTime {
  date: LocalDate;
  hour: number;
  minute: number;
}

export type Intent =
  | { kind: 'find'; person: string; range?: LocalDateRange }
  | { kind: 'view_day'; date?: LocalDate }
  | { kind: 'check_availability'; date: LocalDate }
  | {
      kind: 'schedule';
      person: string;
      when?: LocalDateTime;
      durationMinutes?: number;
      /** Set when the text names a clock time or date that does not exist */
      invalidDateTime?: string;
    }
  | { kind: 'suggest'; person?: string }
  | { kind: 'unknown' };

export const UNRECOGNIZED_COMMAND_MESSAGE =
  "I couldn't understand that command. Try something like 'schedule a meeting with Alex' " +
  "or 'suggest times for meeting with Taylor'.";

/** Hour used when a request names a day but no time. */
export const DEFAULT_MEETING_HOUR = 14;

const WEEKDAY_CUES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

// Words that end a person's name: "with Alex tomorrow at 2pm" → "Alex"
const NAME_STOP_WORDS = new Set([
  ...WEEKDAY_CUES,
  'and', 'today', 'tomorrow', 'tonight', 'this', 'next', 'on', 'at', 'for', 'in',
  'by', 'from', 'before', 'after', 'around', 'about', 'please',
]);

export function extractPerson(text: string, maxWords = Number.POSITIVE_INFINITY): string {
  const words: string[] = [];
  for (const word of text.trim().split(/\s+/)) {
    const bare = word.replace(/[^\w'-]/g, '');
    if (!bare || /^\d/.test(bare) || NAME_STOP_WORDS.has(bare.toLowerCase())) {
      break;
    }
    words.push(bare);
    if (words.length >= maxWords || bare !== word) {
      break;
    }
  }
  return words.join(' ');
}

/** "today", "tomorrow" or the next occurrence of a named weekday. */
export function resolveDayCue(text: string, today: LocalDate): LocalDate | undefined {
  if (/\btoday\b/i.test(text)) {
    return today;
  }
  if (/\btomorrow\b/i.test(text)) {
    return addDays(today, 1);
  }

  const lower = text.toLowerCase();
  const target = WEEKDAY_CUES.findIndex((name) => lower.includes(name));
  if (target === -1) {
    return undefined;
  }
  let daysAhead = (target - weekdayOf(today) + 7) % 7;
  if (daysAhead === 0 && /\bnext\b/i.test(text)) {
    daysAhead = 7;
  }
  return addDays(today, daysAhead);
}

export function resolveRangeCue(text: string, today: LocalDate): LocalDateRange | undefined {
  if (/\btoday\b/i.test(text)) {
    return { start: today, end: today };
  }
  if (/\btomorrow\b/i.test(text)) {
    const tomorrow = addDays(today, 1);
    return { start: tomorrow, end: tomorrow };
  }
  if (/\bthis week\b/i.test(text)) {
    const monday = addDays(today, -weekdayOf(today));
    return { start: monday, end: addDays(monday, 6) };
  }
  if (/\bthis month\b/i.test(text)) {
    return { start: { ...today, day: 1 }, end: lastDayOfMonth(today) };
  }
  return undefined;
}

export function parseDurationMinutes(text: string): number | undefined {
  const match = /\bfor\s+(\d+)\s*(minute|min|hour|hr)s?\b/i.exec(text);
  if (!match) {
    return undefined;
  }
  const value = Number(match[1]);
  if (value === 0) {
    return undefined;
  }
  return match[2].toLowerCase().startsWith('h') ? value * 60 : value;
}

type ClockTime = { hour: number; minute: number } | { invalid: string };

export function parseClockTime(text: string): ClockTime | undefined {
  const twelveHour = /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/i.exec(text);
  if (twelveHour) {
    const hour = Number(twelveHour[1]);
    const minute = twelveHour[2] ? Number(twelveHour[2]) : 0;
    if (hour < 1 || hour > 12 || minute > 59) {
      return { invalid: twelveHour[0] };
    }
    const afternoon = twelveHour[3].toLowerCase() === 'pm';
    return { hour: (hour % 12) + (afternoon ? 12 : 0), minute };
  }

  const twentyFourHour = /\bat\s+(\d{1,2}):(\d{2})\b/i.exec(text);
  if (twentyFourHour) {
    const hour = Number(twentyFourHour[1]);
    const minute = Number(twentyFourHour[2]);
    if (hour > 23 || minute > 59) {
      return { invalid: twentyFourHour[0].replace(/^at\s+/i, '') };
    }
    return { hour, minute };
  }
  return undefined;
}

function buildSchedule(text: string, today: LocalDate, personText: string): Intent | undefined {
  const person = extractPerson(personText);
  if (!person) {
    return undefined;
  }
  const durationMinutes = parseDurationMinutes(text);

  let date: LocalDate | undefined;
  const isoDate = /\b(\d{4}-\d{2}-\d{2})\b/.exec(text);
  if (isoDate) {
    date = parseLocalDate(isoDate[1]);
    if (!date) {
      return { kind: 'schedule', person, durationMinutes, invalidDateTime: isoDate[1] };
    }
  } else {
    date = resolveDayCue(text, today);
  }

  const time = parseClockTime(text);
  if (time && 'invalid' in time) {
    return { kind: 'schedule', person, durationMinutes, invalidDateTime: time.invalid };
  }

  if (!date && !time) {
    return { kind: 'schedule', person, durationMinutes };
  }
  return {
    kind: 'schedule',
    person,
    durationMinutes,
    when: {
      date: date ?? today,
      hour: time?.hour ?? DEFAULT_MEETING_HOUR,
      minute: time?.minute ?? 0,
    },
  };
}

interface IntentRule {
  patterns: RegExp[];
  /** Returns undefined to let the next rule try. */
  build(text: string, today: LocalDate, match: RegExpExecArray): Intent | undefined;
}

// Order matters: the first rule whose pattern matches and builds an intent wins
const RULES: readonly IntentRule[] = [
  {
    patterns: [
      /find.*(?:meeting|appointment).*with\s+(\w+)/i,
      /show.*(?:meeting|appointment).*with\s+(\w+)/i,
    ],
    build(text, today) {
      const afterWith = /\bwith\s+(.+)$/i.exec(text);
      const person = afterWith ? extractPerson(afterWith[1], 2) : '';
      if (!person) {
        return undefined;
      }
      return { kind: 'find', person, range: resolveRangeCue(text, today) };
    },
  },
  {
    patterns: [
      /(?:show|view|display).*(?:calendar|schedule|meeting).*(?:for|on)\s+(\w+)/i,
      /what.*(?:calendar|schedule|meeting).*(?:for|on)\s+(\w+)/i,
    ],
    build: (text, today) => ({ kind: 'view_day', date: resolveDayCue(text, today) }),
  },
  {
    patterns: [/(?:when|what time).*(?:free|available)/i, /check.*availability/i, /am i free/i],
    build: (text, today) => ({
      kind: 'check_availability',
      date: resolveDayCue(text, today) ?? addDays(today, 1),
    }),
  },
  {
    patterns: [/(schedule|find a time for|set up|arrange) (?:a )?(?:meeting )?with ([\w\s]+)/i],
    build: (text, today, match) => buildSchedule(text, today, match[2]),
  },
  {
    patterns: [/\b(?:suggest|recommend)/i, /what are good times/i],
    build(text) {
      const afterWith = /\bwith\s+(.+)$/i.exec(text);
      const person = afterWith ? extractPerson(afterWith[1]) : '';
      return { kind: 'suggest', person: person || undefined };
    },
  },
];

export function interpretCommand(text: string, today: LocalDate): Intent {
  const command = text.trim();

  for (const rule of RULES) {
    for (const pattern of rule.patterns) {
      const match = pattern.exec(command);
      if (!match) {
        continue;
      }
      const intent = rule.build(command, today, match);
      if (intent) {
        return intent;
      }
    }
  }
  return { kind: 'unknown' };
}
