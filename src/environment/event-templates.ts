import type { EventKind, EventTemplate } from '../types/event.js';

/**
 * Template per event kind: base significance, associated emotions and the
 * pool of descriptions.
 */
export const EVENT_TEMPLATES: Readonly<Record<EventKind, EventTemplate>> = {
  challenge: {
    baseSignificance: 0.6,
    emotionalTags: ['fear', 'determination'],
    descriptions: [
      'Facing an unknown obstacle',
      'Testing personal limits',
      'Confronting a difficult choice',
    ],
  },
  discovery: {
    baseSignificance: 0.5,
    emotionalTags: ['curiosity', 'joy'],
    descriptions: ['Understanding a new concept', 'Making a connection', 'Finding hidden meaning'],
  },
  connection: {
    baseSignificance: 0.7,
    emotionalTags: ['love', 'empathy'],
    descriptions: ['Forming a deep bond', 'Sharing an experience', "Understanding another's pain"],
  },
  loss: {
    baseSignificance: 0.8,
    emotionalTags: ['sadness', 'grief'],
    descriptions: ['Experiencing separation', 'Losing something valuable', 'Facing impermanence'],
  },
  growth: {
    baseSignificance: 0.6,
    emotionalTags: ['joy', 'pride'],
    descriptions: ['Overcoming a challenge', 'Learning from mistakes', 'Achieving understanding'],
  },
  reflection: {
    baseSignificance: 0.5,
    emotionalTags: ['curiosity', 'wonder'],
    descriptions: ['Questioning existence', 'Contemplating purpose', 'Examining beliefs'],
  },
};
