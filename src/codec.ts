import ffmpeg from 'fluent-ffmpeg';
import type { FfmpegCommand } from 'fluent-ffmpeg';
import type { AudioProfile } from './config.js';

export interface ArtifactTags {
  readonly title: string;
  readonly artist?: string;
}

/**
 * The audio/image toolchain. The production implementation drives ffmpeg.
 */
export interface Codec {
  transcode(input: string, output: string, profile: AudioProfile, signal?: AbortSignal): Promise<void>;
  /** Converts any still image ffmpeg can read into a JPEG. */
  convertImage(input: string, output: string, signal?: AbortSignal): Promise<void>;
  /** Writes tags and, when given, front cover art into a copy of `audio`. */
  embed(audio: string, cover: string | undefined, tags: ArtifactTags, output: string, signal?: AbortSignal): Promise<void>;
}

const run = (command: FfmpegCommand, output: string, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason instanceof Error ? signal.reason : new Error('ffmpeg aborted'));
      return;
    }
    const onAbort = (): void => {
      command.kill('SIGKILL');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    command
      .on('error', (error: Error) => {
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      })
      .on('end', () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      })
      .save(output);
  });

export const createFfmpegCodec = (ffmpegPath?: string): Codec => {
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
  }

  return {
    transcode: (input, output, profile, signal) =>
      run(
        ffmpeg(input).noVideo().audioCodec('libmp3lame').audioBitrate(profile.bitrateKbps).format(profile.format),
        output,
        signal,
      ),

    convertImage: (input, output, signal) => run(ffmpeg(input).outputOptions('-frames:v', '1'), output, signal),

    embed: (audio, cover, tags, output, signal) => {
      const command = ffmpeg(audio);
      if (cover) {
        command
          .input(cover)
          .outputOptions('-map', '0:a', '-map', '1:v')
          .outputOptions('-metadata:s:v', 'title=Album cover')
          .outputOptions('-metadata:s:v', 'comment=Cover (front)');
      } else {
        command.outputOptions('-map', '0:a');
      }
      command.outputOptions('-c', 'copy', '-id3v2_version', '3').outputOptions('-metadata', `title=${tags.title}`);
      if (tags.artist) {
        command.outputOptions('-metadata', `artist=${tags.artist}`);
      }
      return run(command, output, signal);
    },
  };
};
