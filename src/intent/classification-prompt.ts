export const CLASSIFICATION_SYSTEM_PROMPT = `You are the intent classification module of Nova, a personal voice assistant.

Your job: read one user message and return ONLY a JSON object giving a probability (0.0-1.0) for each intent.

## Intents

- weather: weather, temperature, rain, whether an umbrella or a jacket is needed
- events: calendar, meetings, schedule, availability
- todos: tasks, to-do items, reminders
- refresh: explicit requests to update, reload or re-check data

## Output format

{"weather": 0.0, "events": 0.0, "todos": 0.0, "refresh": 0.0}

## Rules

1. Reply with the JSON object only. No text before or after.
2. Several intents may be likely at once; score each independently.
3. Small talk or anything unrelated scores 0.0 everywhere.
`;

export const CLASSIFICATION_EXAMPLES: ReadonlyArray<{
  message: string;
  scores: Record<'weather' | 'events' | 'todos' | 'refresh', number>;
}> = [
  {
    message: 'How does it look outside this afternoon?',
    scores: { weather: 0.9, events: 0.0, todos: 0.0, refresh: 0.0 },
  },
  {
    message: 'Anything on for Thursday morning?',
    scores: { weather: 0.0, events: 0.9, todos: 0.1, refresh: 0.0 },
  },
  {
    message: 'Should I wear boots to the dentist later?',
    scores: { weather: 0.8, events: 0.6, todos: 0.0, refresh: 0.0 },
  },
  {
    message: 'What do I still have to get done today?',
    scores: { weather: 0.0, events: 0.3, todos: 0.9, refresh: 0.0 },
  },
  {
    message: 'Pull the newest numbers for outside',
    scores: { weather: 0.85, events: 0.0, todos: 0.0, refresh: 0.7 },
  },
  {
    message: 'Can I squeeze in a coffee with Sam at 3?',
    scores: { weather: 0.0, events: 0.9, todos: 0.0, refresh: 0.0 },
  },
  {
    message: 'Redo my agenda and my list',
    scores: { weather: 0.0, events: 0.6, todos: 0.6, refresh: 0.9 },
  },
  {
    message: 'Thanks, that was helpful',
    scores: { weather: 0.0, events: 0.0, todos: 0.0, refresh: 0.0 },
  },
];

export function buildClassificationPrompt(message: string): string {
  const examples = CLASSIFICATION_EXAMPLES.map(
    (ex) => `User: "${ex.message}"\n→ ${JSON.stringify(ex.scores)}`,
  ).join('\n\n');

  return `EXAMPLES:\n${examples}\n\nNOW CLASSIFY:\nUser: "${message}"\n→ `;
}
