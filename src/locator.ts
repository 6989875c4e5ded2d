import { ClassificationError } from './errors.js';
import type { MediaLocator } from './types.js';

const VIDEO_ID = /^[\w-]+$/u;
const PATH_ID_PREFIXES = ['/embed/', '/v/', '/shorts/', '/live/'];

/**
 * Detects whether a given string looks like a YouTube URL.
 */
export const isYoutubeUrl = (input: string): boolean => {
  try {
    const parsed = new URL(input);
    return /(^|\.)youtube\.com$/.test(parsed.hostname) || parsed.hostname === 'youtu.be';
  } catch {
    return false;
  }
};

export const canonicalVideoUrl = (videoId: string): string => `https://www.youtube.com/watch?v=${videoId}`;

/**
 * Pulls the single-video id out of any supported YouTube link shape.
 * Playlist, timestamp and tracking parameters are ignored.
 */
export const extractVideoId = (input: string): string | null => {
  if (!isYoutubeUrl(input)) {
    return null;
  }
  const parsed = new URL(input);
  let candidate: string | null = null;

  if (parsed.hostname === 'youtu.be') {
    candidate = parsed.pathname.split('/')[1] ?? null;
  } else if (parsed.pathname === '/watch') {
    candidate = parsed.searchParams.get('v');
  } else {
    const prefix = PATH_ID_PREFIXES.find((value) => parsed.pathname.startsWith(value));
    if (prefix) {
      candidate = parsed.pathname.slice(prefix.length).split('/')[0] ?? null;
    }
  }

  return candidate && VIDEO_ID.test(candidate) ? candidate : null;
};

/**
 * Decides whether the incoming text is a direct video link or a search phrase.
 * Anything without a single video id, YouTube playlist and channel pages
 * included, is searched for as typed.
 */
export const classify = (text: string): MediaLocator => {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new ClassificationError();
  }

  const videoId = extractVideoId(trimmed);
  if (videoId) {
    return { kind: 'url', url: canonicalVideoUrl(videoId), videoId };
  }
  return { kind: 'search', query: trimmed };
};
