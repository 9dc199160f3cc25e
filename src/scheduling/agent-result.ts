export interface SlotView {
  start: string;
  end: string;
  label: string;
  score?: number;
}

export interface MeetingView {
  id: string;
  title: string;
  start: string;
  end: string;
  label: string;
  htmlLink: string;
}

export interface HourAvailability {
  hour: number;
  label: string;
  busy: boolean;
}

export type AgentResult =
  | {
      status: 'created';
      message: string;
      eventLink: string;
      scheduledTime: string;
      alternatives: SlotView[];
    }
  | {
      status: 'rescheduled';
      message: string;
      eventLink: string;
      scheduledTime: string;
      originalTime: string;
    }
  | { status: 'suggestions'; message: string; slots: SlotView[] }
  | { status: 'no_slot'; message: string; originalTime?: string }
  | { status: 'error'; message: string }
  | { status: 'meetings'; message: string; person: string; meetings: MeetingView[] }
  | { status: 'agenda'; message: string; date: string; events: MeetingView[] }
  | {
      status: 'availability';
      message: string;
      date: string;
      fullyFree: boolean;
      hours: HourAvailability[];
    }
  | { status: 'removed'; message: string; eventId: string }
  | { status: 'moved'; message: string; eventLink: string; scheduledTime: string };

export const errorResult = (message: string): AgentResult => ({ status: 'error', message });
