import { AgentResult, MeetingView } from '../scheduling/agent-result';
import { Preferences } from '../common/types';
import { WEEKDAY_NAMES } from '../common/zoned-time';

export interface ReplyButton {
  label: string;
  data: string;
}

export interface FormattedReply {
  text: string;
  buttons: ReplyButton[];
}

export const CANCEL_ACTION_PREFIX = 'cancel:';

// Telegram rejects callback data longer than 64 bytes
const MAX_CALLBACK_DATA_BYTES = 64;

function cancelButtons(events: MeetingView[]): ReplyButton[] {
  return events.flatMap((event, index) => {
    const data = `${CANCEL_ACTION_PREFIX}${event.id}`;
    return Buffer.byteLength(data) <= MAX_CALLBACK_DATA_BYTES ? [{ label: `Cancel #${index + 1}`, data }] : [];
  });
}

const numbered = (lines: string[]) => lines.map((line, index) => `${index + 1}. ${line}`).join('\n');

export function formatResult(result: AgentResult): FormattedReply {
  switch (result.status) {
    case 'created': {
      let text = `✅ ${result.message}\n🔗 ${result.eventLink}`;
      if (result.alternatives.length > 0) {
        text += `\n\nAlternative times that would also work:\n${numbered(result.alternatives.map((slot) => slot.label))}`;
      }
      return { text, buttons: [] };
    }

    case 'rescheduled':
      return { text: `⚠️ ${result.message}\n🔗 ${result.eventLink}`, buttons: [] };

    case 'suggestions':
      return { text: `💡 ${result.message}\n${numbered(result.slots.map((slot) => slot.label))}`, buttons: [] };

    case 'no_slot':
      return { text: `😕 ${result.message}`, buttons: [] };

    case 'error':
      return { text: `❌ ${result.message}`, buttons: [] };

    case 'meetings':
    case 'agenda': {
      const events = result.status === 'meetings' ? result.meetings : result.events;
      if (events.length === 0) {
        return { text: `ℹ️ ${result.message}`, buttons: [] };
      }
      const lines = events.map((event) => `${event.title} - ${event.label}`);
      return { text: `📅 ${result.message}\n${numbered(lines)}`, buttons: cancelButtons(events) };
    }

    case 'availability': {
      if (result.fullyFree) {
        return { text: `🟢 ${result.message}`, buttons: [] };
      }
      const rows = result.hours.map((hour) => `${hour.label}  ${hour.busy ? '🔴 Busy' : '🟢 Available'}`);
      return { text: `🗓 ${result.message}\n${rows.join('\n')}`, buttons: [] };
    }

    case 'removed':
      return { text: `🗑️ ${result.message}`, buttons: [] };

    case 'moved':
      return { text: `✅ ${result.message}`, buttons: [] };
  }
}

export function formatPreferences(preferences: Preferences): string {
  const lines = ['📊 Your scheduling preferences', ''];

  lines.push(
    preferences.preferredDays.length > 0
      ? `Preferred meeting days: ${preferences.preferredDays.map((day) => WEEKDAY_NAMES[day]).join(', ')}`
      : 'Preferred meeting days: Not enough data',
  );
  lines.push(
    preferences.preferredHours.length > 0
      ? `Preferred meeting times: ${preferences.preferredHours.map((hour) => `${hour}:00`).join(', ')}`
      : 'Preferred meeting times: Not enough data',
  );
  lines.push(`Typical meeting duration: ${preferences.averageDurationMinutes} minutes`);

  if (preferences.frequentContacts.length > 0) {
    lines.push('People you meet with frequently:');
    preferences.frequentContacts.slice(0, 5).forEach((contact) => lines.push(`- ${contact}`));
  }
  return lines.join('\n');
}
