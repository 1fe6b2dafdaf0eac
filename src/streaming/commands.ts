import { formatHostForUrl } from '../lib/network.js';

export const INGEST_LATENCY_MS = 120;
export const VIEWER_LATENCY_MS = 3000;

export const FFMPEG_COMMON_ARGS = ['-hide_banner', '-loglevel', 'warning', '-stats', '-nostdin'] as const;

const MPV_COMMON_ARGS = [
  '--input-default-bindings=yes',
  '--input-vo-keyboard=yes',
  '--sub-auto=fuzzy',
  '--audio-channels=stereo',
  '--volume=100',
  '--volume-max=150',
  '--msg-level=all=info',
] as const;

const MPV_CACHE_ARGS = [
  '--cache=yes',
  '--cache-secs=300',
  '--demuxer-max-bytes=150M',
  '--demuxer-max-back-bytes=75M',
  '--hwdec=auto',
  '--vo=gpu',
  '--gpu-api=auto',
  '--video-sync=audio',
] as const;

const MPV_SENDER_ARGS = [
  ...MPV_CACHE_ARGS,
  '--keep-open=yes',
  '--force-window=yes',
  '--osc=yes',
  '--osd-bar=yes',
  '--network-timeout=60',
  '--stream-lavf-o=rtmp_live=1',
  '--title=Watch Party - Host',
] as const;

const MPV_RECEIVER_ARGS = [
  ...MPV_CACHE_ARGS,
  '--keep-open=no',
  '--force-window=immediate',
  '--osc=yes',
  '--osd-bar=yes',
  '--network-timeout=60',
  '--demuxer-lavf-o=protocol_whitelist=[srt,crypto,file,rtp,tcp,udp]',
  '--title=Watch Party - Viewer',
] as const;

export type PlayerRole = 'sender' | 'receiver';

export function rtmpStreamUrl(rtmpPort: number): string {
  return `rtmp://127.0.0.1:${rtmpPort}/live/stream`;
}

export function srtListenerUrl(bindAddress: string, port: number, latencyMs: number): string {
  return `srt://${formatHostForUrl(bindAddress)}:${port}?mode=listener&latency=${latencyMs}`;
}

export function srtCallerUrl(host: string, port: number, latencyMs = VIEWER_LATENCY_MS): string {
  return `srt://${formatHostForUrl(host)}:${port}?mode=caller&latency=${latencyMs}`;
}

/** SRT from the broadcaster's encoder, remuxed to FLV on the local RTMP server. */
export function ingestCommand(ffmpeg: string, srtPort: number, bindAddress: string, rtmpUrl: string): string[] {
  return [
    ffmpeg,
    ...FFMPEG_COMMON_ARGS,
    '-analyzeduration', '10000000',
    '-probesize', '10000000',
    '-fflags', '+genpts',
    '-i', srtListenerUrl(bindAddress, srtPort, INGEST_LATENCY_MS),
    '-c', 'copy',
    '-f', 'flv',
    '-flvflags', 'no_duration_filesize',
    rtmpUrl,
  ];
}

/** The local RTMP stream re-served as MPEG-TS on one viewer's SRT listener. */
export function viewerRelayCommand(ffmpeg: string, rtmpUrl: string, srtPort: number, bindAddress: string): string[] {
  return [
    ffmpeg,
    ...FFMPEG_COMMON_ARGS,
    '-analyzeduration', '5000000',
    '-probesize', '5000000',
    '-fflags', '+genpts',
    '-re',
    '-i', rtmpUrl,
    '-c', 'copy',
    '-f', 'mpegts',
    srtListenerUrl(bindAddress, srtPort, VIEWER_LATENCY_MS),
  ];
}

export function playerCommand(mpv: string, role: PlayerRole, streamUrl: string): string[] {
  const roleArgs = role === 'sender' ? MPV_SENDER_ARGS : MPV_RECEIVER_ARGS;
  return [mpv, ...roleArgs, ...MPV_COMMON_ARGS, streamUrl];
}

export function streamServerCommand(nginx: string): string[] {
  return [nginx];
}
