import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { isEnabled, readEnv } from "./env.js";

const x264Presets = [
  "ultrafast",
  "superfast",
  "veryfast",
  "faster",
  "fast",
  "medium",
  "slow",
  "slower",
  "veryslow"
] as const;

const port = (fallback: number) => z.coerce.number().int().min(1).max(65_535).default(fallback);
const seconds = (fallback: number) => z.coerce.number().positive().default(fallback);

const channelEnvShape = z.object({
  CHANNEL_ROOT: z.string().optional(),
  VIDEO_DIR: z.string().optional(),
  AUDIO_DIR: z.string().optional(),
  VIDEO_PLAYLIST: z.string().optional(),
  AUDIO_PLAYLIST: z.string().optional(),
  HLS_DIR: z.string().optional(),
  MODE: z.enum(["hls", "vlc_ts"]).default("hls"),
  TOPOLOGY: z.enum(["single", "split"]).default("single"),
  YOUTUBE_URL: z.string().url().optional(),
  YTDLP_FORMAT: z.string().default("bestaudio[ext=m4a]/bestaudio/best"),
  CRF: z.coerce.number().int().min(0).max(51).default(23),
  PRESET: z.enum(x264Presets).default("veryfast"),
  GOP: z.coerce.number().int().positive().default(60),
  HLS_TIME: z.coerce.number().positive().default(4),
  HLS_LIST_SIZE: z.coerce.number().int().nonnegative().default(6),
  AUDIO_BITRATE: z
    .string()
    .regex(/^\d+[kKmM]?$/, "expected a bitrate such as 160k")
    .default("160k"),
  AUDIO_SR: z.coerce.number().int().positive().default(48_000),
  AUDIO_CH: z.coerce.number().int().min(1).max(8).default(2),
  MAX_HEIGHT: z.coerce.number().int().nonnegative().default(0),
  VIDEO_UDP_PORT: port(23_000),
  AUDIO_UDP_PORT: port(23_001),
  BIND: z.string().default("0.0.0.0"),
  PORT: port(8090),
  RESTART_DELAY: seconds(2),
  STOP_GRACE: seconds(5),
  POLL_INTERVAL: seconds(2),
  RECURSIVE: z.string().optional(),
  SHUFFLE: z.string().optional(),
  RANDOM_START: z.string().optional(),
  FFMPEG_PATH: z.string().default("ffmpeg"),
  FFMPEG_LOGLEVEL: z.string().default("info"),
  YT_DLP_PATH: z.string().default("yt-dlp"),
  YT_DLP_PYTHON: z.string().default("python3"),
  STATUS_PORT: z.coerce.number().int().min(0).max(65_535).default(0)
});

const channelEnvSchema = channelEnvShape.superRefine((value, ctx) => {
  if (value.TOPOLOGY === "split" && !value.YOUTUBE_URL && value.VIDEO_UDP_PORT === value.AUDIO_UDP_PORT) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["AUDIO_UDP_PORT"],
      message: "must differ from VIDEO_UDP_PORT"
    });
  }
});

export type Topology = "single" | "split" | "external-audio";

export type OutputTarget =
  | {
      kind: "hls";
      dir: string;
      playlistPath: string;
      segmentPattern: string;
      segmentSeconds: number;
      listSize: number;
    }
  | { kind: "http-ts"; url: string };

export type EncodeSettings = {
  crf: number;
  preset: (typeof x264Presets)[number];
  gop: number;
  audioBitrate: string;
  audioSampleRate: number;
  audioChannels: number;
  maxHeight: number;
  logLevel: string;
};

export type LibrarySettings = {
  videoDir: string;
  audioDir: string;
  recursive: boolean;
  shuffle: boolean;
  randomStart: boolean;
};

export type ChannelConfig = {
  library: LibrarySettings;
  plans: { videoPlan: string; audioPlan: string };
  topology: Topology;
  output: OutputTarget;
  encode: EncodeSettings;
  transport: { videoPort: number; audioPort: number };
  externalAudio: { sourceUrl: string; preferredFormat: string } | null;
  timing: { restartDelayMs: number; stopGraceMs: number; pollIntervalMs: number };
  tools: { ffmpeg: string; ytDlp: string; ytDlpPython: string };
  statusPort: number;
};

const collectRawEnv = (env: NodeJS.ProcessEnv) => {
  const raw: Record<string, string | undefined> = {};
  for (const key of channelEnvShape.keyof().options) {
    raw[key] = readEnv(env, key);
  }
  return raw;
};

export const loadChannelConfig = (
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ChannelConfig => {
  const parsed = channelEnvSchema.safeParse(collectRawEnv(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }
  const values = parsed.data;
  const root = path.resolve(cwd, values.CHANNEL_ROOT ?? ".");
  const fromRoot = (value: string | undefined, fallback: string) =>
    path.resolve(root, value ?? fallback);

  const hlsDir = fromRoot(values.HLS_DIR, "hls");
  const output: OutputTarget =
    values.MODE === "hls"
      ? {
          kind: "hls",
          dir: hlsDir,
          playlistPath: path.join(hlsDir, "live.m3u8"),
          segmentPattern: path.join(hlsDir, "seg_%06d.ts"),
          segmentSeconds: values.HLS_TIME,
          listSize: values.HLS_LIST_SIZE
        }
      : { kind: "http-ts", url: `http://${values.BIND}:${values.PORT}/stream.ts` };

  return {
    library: {
      videoDir: fromRoot(values.VIDEO_DIR, "."),
      audioDir: fromRoot(values.AUDIO_DIR, "audio"),
      recursive: isEnabled(values.RECURSIVE),
      shuffle: isEnabled(values.SHUFFLE),
      randomStart: isEnabled(values.RANDOM_START)
    },
    plans: {
      videoPlan: fromRoot(values.VIDEO_PLAYLIST, "playlist.txt"),
      audioPlan: fromRoot(values.AUDIO_PLAYLIST, "audio_playlist.txt")
    },
    topology: values.YOUTUBE_URL ? "external-audio" : values.TOPOLOGY,
    output,
    encode: {
      crf: values.CRF,
      preset: values.PRESET,
      gop: values.GOP,
      audioBitrate: values.AUDIO_BITRATE,
      audioSampleRate: values.AUDIO_SR,
      audioChannels: values.AUDIO_CH,
      maxHeight: values.MAX_HEIGHT,
      logLevel: values.FFMPEG_LOGLEVEL
    },
    transport: { videoPort: values.VIDEO_UDP_PORT, audioPort: values.AUDIO_UDP_PORT },
    externalAudio: values.YOUTUBE_URL
      ? { sourceUrl: values.YOUTUBE_URL, preferredFormat: values.YTDLP_FORMAT }
      : null,
    timing: {
      restartDelayMs: Math.round(values.RESTART_DELAY * 1000),
      stopGraceMs: Math.round(values.STOP_GRACE * 1000),
      pollIntervalMs: Math.round(values.POLL_INTERVAL * 1000)
    },
    tools: {
      ffmpeg: values.FFMPEG_PATH,
      ytDlp: values.YT_DLP_PATH,
      ytDlpPython: values.YT_DLP_PYTHON
    },
    statusPort: values.STATUS_PORT
  };
};
