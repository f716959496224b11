import type { EncodeSettings, OutputTarget } from "../config/channel.js";

const hlsFlags = "delete_segments+append_list+independent_segments";
const udpPacketSize = 1316;
const udpFifoSize = 2_000_000;

export const loopedConcatInput = (planPath: string) => [
  "-re",
  "-stream_loop",
  "-1",
  "-f",
  "concat",
  "-safe",
  "0",
  "-i",
  planPath
];

export const scaleFilter = (maxHeight: number) =>
  maxHeight > 0 ? `scale=-2:'min(${maxHeight},ih)'` : null;

export const videoEncodeArgs = (encode: EncodeSettings) => {
  const args = [
    "-c:v",
    "libx264",
    "-preset",
    encode.preset,
    "-crf",
    String(encode.crf),
    "-pix_fmt",
    "yuv420p"
  ];
  const scale = scaleFilter(encode.maxHeight);
  if (scale) {
    args.push("-vf", scale);
  }
  // Fixed GOP without scene-cut keyframes keeps segment boundaries aligned.
  args.push("-g", String(encode.gop), "-keyint_min", String(encode.gop), "-sc_threshold", "0");
  return args;
};

export const audioEncodeArgs = (encode: EncodeSettings) => [
  "-c:a",
  "aac",
  "-b:a",
  encode.audioBitrate,
  "-ac",
  String(encode.audioChannels),
  "-ar",
  String(encode.audioSampleRate),
  "-af",
  "aresample=async=1:first_pts=0"
];

export const outputArgs = (output: OutputTarget) => {
  if (output.kind === "http-ts") {
    return ["-f", "mpegts", "-muxdelay", "0", "-muxpreload", "0", "-listen", "1", output.url];
  }
  return [
    "-f",
    "hls",
    "-hls_time",
    String(output.segmentSeconds),
    "-hls_list_size",
    String(output.listSize),
    "-hls_flags",
    hlsFlags,
    "-hls_segment_filename",
    output.segmentPattern,
    output.playlistPath
  ];
};

export const udpSendUrl = (port: number) => `udp://127.0.0.1:${port}?pkt_size=${udpPacketSize}`;

// Overruns drop data instead of failing the muxer when a feeder bursts.
export const udpReceiveUrl = (port: number) =>
  `udp://127.0.0.1:${port}?fifo_size=${udpFifoSize}&overrun_nonfatal=1`;

const banner = (logLevel: string) => ["-hide_banner", "-loglevel", logLevel];

export type CombinedPipelineArgs = {
  videoPlan: string;
  audioPlan: string;
  encode: EncodeSettings;
  output: OutputTarget;
};

/** One process looping both concat plans into the final output. */
export const buildCombinedArgs = ({ videoPlan, audioPlan, encode, output }: CombinedPipelineArgs) => [
  ...banner(encode.logLevel),
  ...loopedConcatInput(videoPlan),
  ...loopedConcatInput(audioPlan),
  "-map",
  "0:v:0",
  "-map",
  "1:a:0",
  ...videoEncodeArgs(encode),
  ...audioEncodeArgs(encode),
  ...outputArgs(output)
];

export type ExternalAudioPipelineArgs = {
  videoPlan: string;
  audioUrl: string;
  encode: EncodeSettings;
  output: OutputTarget;
};

export const buildExternalAudioArgs = ({ videoPlan, audioUrl, encode, output }: ExternalAudioPipelineArgs) => [
  ...banner(encode.logLevel),
  ...loopedConcatInput(videoPlan),
  "-reconnect",
  "1",
  "-reconnect_streamed",
  "1",
  "-reconnect_on_network_error",
  "1",
  "-reconnect_on_http_error",
  "4xx,5xx",
  "-reconnect_delay_max",
  "5",
  "-thread_queue_size",
  "1024",
  "-i",
  audioUrl,
  "-map",
  "0:v:0",
  "-map",
  "1:a:0",
  ...videoEncodeArgs(encode),
  ...audioEncodeArgs(encode),
  ...outputArgs(output)
];

/** Transcodes one video file, video only, onto the local video transport. */
export const buildVideoFeedArgs = (filePath: string, encode: EncodeSettings, port: number) => [
  ...banner("warning"),
  "-re",
  "-i",
  filePath,
  "-map",
  "0:v:0",
  "-an",
  ...videoEncodeArgs(encode),
  "-f",
  "mpegts",
  "-muxdelay",
  "0",
  "-muxpreload",
  "0",
  udpSendUrl(port)
];

export const buildAudioFeedArgs = (filePath: string, encode: EncodeSettings, port: number) => [
  ...banner("warning"),
  "-re",
  "-i",
  filePath,
  "-map",
  "0:a:0",
  "-vn",
  ...audioEncodeArgs(encode),
  "-f",
  "mpegts",
  "-muxdelay",
  "0",
  "-muxpreload",
  "0",
  udpSendUrl(port)
];

export type MuxerArgs = {
  videoPort: number;
  audioPort: number;
  logLevel: string;
  output: OutputTarget;
};

export const buildMuxerArgs = ({ videoPort, audioPort, logLevel, output }: MuxerArgs) => [
  ...banner(logLevel),
  "-thread_queue_size",
  "2048",
  "-i",
  udpReceiveUrl(videoPort),
  "-thread_queue_size",
  "2048",
  "-i",
  udpReceiveUrl(audioPort),
  "-map",
  "0:v:0",
  "-map",
  "1:a:0",
  "-c",
  "copy",
  ...outputArgs(output)
];
