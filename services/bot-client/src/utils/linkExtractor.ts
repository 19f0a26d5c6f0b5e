/**
 * Link Extractor
 *
 * Pulls URLs out of a message. Rich-text annotations are authoritative; the
 * plain-text pattern is only consulted when the annotations yield nothing.
 */

import type { InboundMessage } from '../types/messages.js';
import { normalizeUrl } from './urlNormalizer.js';

/**
 * http/https followed by a host and optional path, query and fragment characters
 */
export const URL_PATTERN = /https?:\/\/(?:[-\w.]|%[0-9a-fA-F]{2})+[/\w.\-?=%&#@!$+]*/g;

/**
 * URLs named by the message's annotations, in span order
 */
function linksFromSpans(message: InboundMessage, body: string): string[] {
  const urls: string[] = [];
  for (const span of message.spans) {
    if (span.kind === 'url') {
      urls.push(body.slice(span.offset, span.offset + span.length));
    } else if (span.kind === 'text_link') {
      urls.push(span.url);
    }
  }
  return urls;
}

function linksFromText(body: string): string[] {
  return body.match(new RegExp(URL_PATTERN)) ?? [];
}

/**
 * Extract normalized URLs from a message's text (or caption when it has no text),
 * deduplicated in first-seen order
 */
export function extractLinks(message: InboundMessage): string[] {
  const body = message.text ?? message.caption ?? '';
  if (body.length === 0) {
    return [];
  }

  let raw = linksFromSpans(message, body);
  if (raw.length === 0) {
    raw = linksFromText(body);
  }

  const seen = new Set<string>();
  for (const url of raw) {
    const normalized = normalizeUrl(url);
    if (normalized.length > 0) {
      seen.add(normalized);
    }
  }
  return [...seen];
}
