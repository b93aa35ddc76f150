import type { ClassificationRequest, ClassificationResult, Intent } from './types.js';
import { PRACTICE_AREAS, PRACTICE_AREA_KEYS, findPracticeArea, titleCase } from './practiceAreas.js';

export const HELP_TEXT =
  "I'm your AI legal assistant. I can: book a consultation, share our practice areas, " +
  'explain attorney bios, provide office hours and location, and help with contact details.';

export const AREA_FALLBACK_REPLY = 'We cover several areas. Which practice are you interested in?';

const DEFAULT_SUGGESTIONS = ['Practice areas', 'Book consultation', 'Contact'] as const;

interface IntentRule {
  intent: Intent;
  triggers: readonly string[];
  respond: (text: string) => Omit<ClassificationResult, 'intent'>;
}

function listAreas(): string {
  return PRACTICE_AREA_KEYS.map(titleCase).join(', ');
}

// Evaluated in order; the first rule with a matching trigger wins.
const RULES: readonly IntentRule[] = [
  {
    intent: 'book_consultation',
    triggers: ['book', 'consult', 'appointment', 'schedule'],
    respond: () => ({
      reply:
        'I can help you schedule a consultation. Would you like a 15-minute call or a 30-minute meeting? ' +
        'You can also use the contact form below and we’ll confirm by email.',
      suggestions: ['15-minute call', '30-minute meeting', 'Contact form'],
    }),
  },
  {
    intent: 'practice_areas',
    triggers: ['practice', 'services', 'areas', 'specialize', 'what do you do'],
    respond: () => ({
      reply: `We focus on ${listAreas()}. Ask about any area for more details, for example: 'Tell me about Corporate'.`,
      suggestions: PRACTICE_AREA_KEYS.map(titleCase),
    }),
  },
  {
    intent: 'area_detail',
    triggers: ['corporate', 'litigation', 'ip', 'intellectual', 'employment', 'real estate'],
    respond: (text) => {
      const area = findPracticeArea(text);
      return {
        reply: area !== undefined ? PRACTICE_AREAS[area] : AREA_FALLBACK_REPLY,
        suggestions: ['Book a consultation', 'View attorneys'],
      };
    },
  },
  {
    intent: 'attorneys',
    triggers: ['attorney', 'lawyer', 'team', 'who'],
    respond: () => ({
      reply:
        'Our attorneys combine top-tier expertise with practical business insight. ' +
        "You can review profiles below and choose who you'd like to meet.",
      suggestions: ['View attorneys', 'Book a consultation'],
    }),
  },
  {
    intent: 'contact_info',
    triggers: ['contact', 'email', 'phone', 'address', 'location', 'hours'],
    respond: () => ({
      reply:
        'You can reach us at (555) 214-0199 or hello@lexora.law. ' +
        'We’re available Mon–Fri, 9am–6pm, at 100 Market Street, Suite 500.',
      suggestions: ['Get directions', 'Send an email', 'Call now'],
    }),
  },
  {
    intent: 'help',
    triggers: ['help', 'what can you do', 'how do you work'],
    respond: () => ({
      reply: HELP_TEXT,
      suggestions: [...DEFAULT_SUGGESTIONS],
    }),
  },
];

const SMALL_TALK_REPLY =
  "I’m your AI legal assistant. Ask about practice areas, attorney bios, or say 'book a consultation'.";

/**
 * Rule-based, single-turn classifier. Matching is case-insensitive substring
 * containment on the trimmed message; `context` is ignored.
 */
export class IntentClassifier {
  classify(request: ClassificationRequest): ClassificationResult {
    const text = request.message.trim().toLowerCase();

    for (const rule of RULES) {
      if (rule.triggers.some((trigger) => text.includes(trigger))) {
        return { intent: rule.intent, ...rule.respond(text) };
      }
    }

    return {
      intent: 'small_talk',
      reply: SMALL_TALK_REPLY,
      suggestions: [...DEFAULT_SUGGESTIONS],
    };
  }
}
