import {
  isJsonObject,
  readNumber,
  readString,
  type JsonObject,
  type JsonValue,
} from '../common/json';

const MAX_FALLBACK_CHARS = 1200;
const MAX_FORECAST_DAYS = 3;

/**
 * Open-Meteo style payload: `current` + `current_units`, and `daily` arrays
 * keyed by `time`.
 */
export function summarizeWeather(payload: JsonValue): string | null {
  if (!isJsonObject(payload)) return null;
  const lines: string[] = [];

  const current = payload['current'];
  const units = payload['current_units'];
  const unit =
    (isJsonObject(units) ? readString(units, 'temperature_2m') : undefined) ??
    '°';

  if (isJsonObject(current)) {
    const temp = readNumber(current, 'temperature_2m');
    const precip = readNumber(current, 'precipitation') ?? 0;
    if (temp !== undefined) {
      lines.push(
        `Now: ${Math.round(temp)}${unit}, ${precip > 0 ? `precipitation ${precip}mm` : 'no precipitation'}`,
      );
    }
  }

  const daily = payload['daily'];
  if (isJsonObject(daily)) {
    const days = numberOrStringArray(daily['time']);
    const highs = numberOrStringArray(daily['temperature_2m_max']);
    const lows = numberOrStringArray(daily['temperature_2m_min']);

    days.slice(0, MAX_FORECAST_DAYS).forEach((day, i) => {
      const high = highs[i];
      const low = lows[i];
      lines.push(
        typeof high === 'number' && typeof low === 'number'
          ? `${day}: high ${Math.round(high)}${unit}, low ${Math.round(low)}${unit}`
          : `${day}`,
      );
    });
  }

  return lines.length > 0 ? lines.join('\n') : null;
}

/** A list of `{ summary, start, end?, location? }`, bare or under `events`. */
export function summarizeEvents(payload: JsonValue): string | null {
  const events = listOf(payload, 'events');
  if (!events) return null;
  if (events.length === 0) return 'No events scheduled.';

  const lines = [...events]
    .sort((a, b) => (readString(a, 'start') ?? '').localeCompare(readString(b, 'start') ?? ''))
    .map((event) => {
      const title = readString(event, 'summary') ?? 'Untitled event';
      const start = readString(event, 'start') ?? '';
      const end = readString(event, 'end') ?? '';
      const location = readString(event, 'location');

      const startTime = timeOf(start);
      const when = !startTime
        ? 'all day'
        : timeOf(end)
          ? `${startTime}-${timeOf(end)}`
          : startTime;
      return `- ${when}: ${title}${location ? ` @ ${location}` : ''}`;
    });

  lines.push(`(${events.length} event${events.length === 1 ? '' : 's'})`);
  return lines.join('\n');
}

const PRIORITY_MARKERS: Record<number, string> = { 4: '[!]', 3: '[-]' };

/** A list of `{ content, priority?, due?: { date } }`, bare or under `tasks`. */
export function summarizeTodos(payload: JsonValue): string | null {
  const todos = listOf(payload, 'tasks');
  if (!todos) return null;
  if (todos.length === 0) return 'No tasks scheduled.';

  const lines = todos.map((todo) => {
    const content = readString(todo, 'content') ?? 'Untitled task';
    const priority = readNumber(todo, 'priority') ?? 1;
    const due = todo['due'];
    const dueDate = isJsonObject(due) ? readString(due, 'date') : undefined;
    const marker = PRIORITY_MARKERS[priority] ?? '[ ]';
    return `- ${marker} ${content}${dueDate ? ` (due ${dueDate})` : ''}`;
  });

  lines.push(`Total: ${todos.length} task${todos.length === 1 ? '' : 's'}`);
  return lines.join('\n');
}

/** Compact JSON for payloads no summarizer recognises. */
export function compactJson(payload: JsonValue): string {
  const text = JSON.stringify(payload);
  return text.length > MAX_FALLBACK_CHARS
    ? `${text.slice(0, MAX_FALLBACK_CHARS)}…`
    : text;
}

function listOf(payload: JsonValue, field: string): JsonObject[] | null {
  const list = isJsonObject(payload) ? payload[field] : payload;
  if (!Array.isArray(list)) return null;
  return list.filter(isJsonObject);
}

function numberOrStringArray(value: JsonValue | undefined): Array<number | string> {
  if (!Array.isArray(value)) return [];
  return value.flatMap((v) =>
    typeof v === 'number' || typeof v === 'string' ? [v] : [],
  );
}

/** "HH:MM" of an ISO datetime as written, or null for date-only values. */
function timeOf(value: string): string | null {
  const match = /T(\d{2}):(\d{2})/.exec(value);
  return match ? `${match[1]}:${match[2]}` : null;
}
