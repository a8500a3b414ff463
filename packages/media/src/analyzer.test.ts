import { describe, it, expect } from 'vitest';
import { parseProbeOutput } from './probes/ffprobe.js';
import { toMediaMetadata, parseFrameRate } from './analyzer.js';

const probeJson = JSON.stringify({
  format: {
    filename: 'media/episode.mkv',
    nb_streams: 3,
    format_name: 'matroska,webm',
    format_long_name: 'Matroska / WebM',
    duration: '1325.440000',
    size: '734003200',
    bit_rate: '4430112',
    tags: { title: 'Episode' },
  },
  streams: [
    {
      index: 0,
      codec_name: 'h264',
      codec_type: 'video',
      profile: 'High',
      width: 1920,
      height: 1080,
      pix_fmt: 'yuv420p',
      avg_frame_rate: '24000/1001',
      disposition: { default: 1, forced: 0 },
    },
    {
      index: 1,
      codec_name: 'flac',
      codec_type: 'audio',
      sample_rate: '48000',
      channels: 2,
      channel_layout: 'stereo',
      bits_per_raw_sample: '24',
      tags: { language: 'eng' },
      disposition: { default: 1, forced: 0 },
    },
    {
      index: 2,
      codec_name: 'subrip',
      codec_type: 'subtitle',
      tags: { language: 'fre', title: 'French' },
      disposition: { default: 0, forced: 1 },
    },
  ],
});

describe('toMediaMetadata', () => {
  const probe = parseProbeOutput(probeJson);

  it('parses the fixture', () => {
    expect(probe).not.toBeNull();
  });

  it('summarises the container', () => {
    if (!probe) return;
    const metadata = toMediaMetadata('media/episode.mkv', probe);

    expect(metadata.fileName).toBe('episode.mkv');
    expect(metadata.format).toBe('matroska,webm');
    expect(metadata.duration).toBe(1325.44);
    expect(metadata.fileSize).toBe(734003200);
    expect(metadata.bitRate).toBe(4430112);
    expect(metadata.tags).toEqual({ title: 'Episode' });
  });

  it('splits streams by type', () => {
    if (!probe) return;
    const metadata = toMediaMetadata('media/episode.mkv', probe);

    expect(metadata.videoStreams).toHaveLength(1);
    expect(metadata.videoStreams[0]).toMatchObject({
      codec: 'h264',
      width: 1920,
      height: 1080,
      isDefault: true,
    });
    expect(metadata.videoStreams[0]?.fps).toBeCloseTo(23.976, 3);

    expect(metadata.audioStreams[0]).toMatchObject({
      codec: 'flac',
      sampleRate: 48000,
      channels: 2,
      channelLayout: 'stereo',
      bitDepth: 24,
      language: 'eng',
    });

    expect(metadata.subtitleStreams[0]).toEqual({
      index: 2,
      codec: 'subrip',
      language: 'fre',
      title: 'French',
      isDefault: false,
      isForced: true,
    });
  });
});

describe('parseFrameRate', () => {
  it('handles rationals, integers and zero denominators', () => {
    expect(parseFrameRate('25/1')).toBe(25);
    expect(parseFrameRate('30')).toBe(30);
    expect(parseFrameRate('0/0')).toBe(0);
  });
});
