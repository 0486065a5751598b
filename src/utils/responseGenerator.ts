// src/utils/responseGenerator.ts
import type { CalendarAction, ExecutionResult, ParsedIntent } from '../types/intent.js';
import type { MatchCandidate } from '../types/calendar.js';
import { formatDate, formatTime } from './presentation.js';
import { hasTimeComponent, type ResolveOptions } from './timeResolver.js';

function candidateLine(index: number, match: MatchCandidate): string {
  if (match.time) return `${index}. ${match.title} (${match.time})`;
  if (hasTimeComponent(match.start)) return `${index}. ${match.title} at ${formatTime(match.start)}`;
  return `${index}. ${match.title}`;
}

function disambiguationPrompt(matches: MatchCandidate[]): string {
  const lines = matches.map((match, i) => candidateLine(i + 1, match));
  return [
    'I found multiple matches - which one did you mean?',
    '',
    ...lines,
    '',
    'Type 1, 2, 3... to select, or type a new command to cancel.',
  ].join('\n');
}

function notFoundReply(intent: ParsedIntent, options: ResolveOptions): string {
  const { title, date, time } = intent;

  if (time && date) {
    const when = `${formatTime(time)} on ${formatDate(date, options)}`;
    return title ? `Sorry, I couldn't find '${title}' at ${when}` : `You have nothing scheduled at ${when}`;
  }

  if (date) {
    const day = formatDate(date, options);
    return title ? `Sorry, I couldn't find '${title}' on ${day}` : `You have nothing scheduled for ${day}`;
  }

  return "Sorry, I couldn't find any matching events";
}

/**
 * Turn an execution result into the reply shown to the user.
 * Relative dates in the intent ("tomorrow") are resolved against `options`.
 */
export function generateResponse(
  action: CalendarAction,
  intent: ParsedIntent,
  result: ExecutionResult,
  options: ResolveOptions = {}
): string {
  if (!result.success) {
    if (result.needs_confirmation && result.multiple_matches && result.multiple_matches.length > 0) {
      return disambiguationPrompt(result.multiple_matches);
    }

    const message = result.message || 'Something went wrong';
    if (message.includes('No events found') || message.includes('No matching events found')) {
      return notFoundReply(intent, options);
    }

    return `Sorry, ${message}`;
  }

  const title = result.event?.title || intent.title || 'Event';

  switch (action) {
    case 'create': {
      const start = result.event?.start;
      const day = start ? formatDate(start) : intent.date ? formatDate(intent.date, options) : 'today';
      const time = start ? formatTime(start) : intent.time ? formatTime(intent.time) : '12:00 PM';
      return `✓ Done! '${title}' scheduled for ${day} at ${time}`;
    }

    case 'delete':
      return intent.date
        ? `✓ Done! '${title}' on ${formatDate(intent.date, options)} has been cancelled`
        : `✓ Done! '${title}' has been cancelled`;

    case 'move': {
      if (intent.new_date && intent.new_time) {
        return `✓ Done! '${title}' moved to ${formatDate(intent.new_date, options)} at ${formatTime(intent.new_time)}`;
      }
      if (intent.new_date) {
        return `✓ Done! '${title}' moved to ${formatDate(intent.new_date, options)}`;
      }
      return `✓ Done! '${title}' has been rescheduled`;
    }

    case 'list': {
      const events = result.events ?? [];
      if (events.length === 0) {
        const day = intent.date ? formatDate(intent.date, options) : 'that time';
        return `You have nothing scheduled for ${day}`;
      }

      const heading = intent.date ? formatDate(intent.date, options) : 'your schedule';
      const lines = events.map((event) => {
        if (event.time) return `• ${event.time} - ${event.title}`;
        if (hasTimeComponent(event.start)) return `• ${formatTime(event.start)} - ${event.title}`;
        return `• ${event.title}`;
      });
      return `Here's what you have on ${heading}:\n\n${lines.join('\n')}`;
    }

    default:
      return result.message || 'Done!';
  }
}
