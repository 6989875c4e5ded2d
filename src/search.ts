import ytSearch from 'yt-search';
import { canonicalVideoUrl } from './locator.js';
import type { CandidateItem } from './types.js';

/**
 * Performs a keyword search on YouTube and returns the video matches in the
 * platform's relevance order.
 */
export const searchVideos = async (query: string, limit: number): Promise<CandidateItem[]> => {
  const searchResult = await ytSearch(query);
  return (searchResult.videos ?? []).slice(0, limit).map((video) => ({
    id: video.videoId,
    title: video.title,
    uploader: video.author?.name,
    durationSeconds: video.seconds ?? video.duration?.seconds ?? 0,
    thumbnailUrl: video.thumbnail || video.image || undefined,
    sourceUrl: canonicalVideoUrl(video.videoId),
  }));
};
