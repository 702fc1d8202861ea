import {
  AudioPlayer,
  AudioPlayerStatus,
  AudioResource,
  createAudioPlayer,
  createAudioResource,
  DiscordGatewayAdapterCreator,
  entersState,
  joinVoiceChannel,
  NoSubscriberBehavior,
  StreamType,
  VoiceConnection,
  VoiceConnectionStatus,
} from '@discordjs/voice';
import { Client } from 'discord.js';
import ffmpeg, { FfmpegCommand } from 'fluent-ffmpeg';
import { PassThrough } from 'stream';
import {
  StreamCompletion,
  StreamOptions,
  VoiceChannelRef,
  VoiceSession,
  VoiceTransport,
} from '../types/music';
import { Logger, LogCategory } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler.util';

const RECONNECT_GRACE_MS = 5_000;

const RECONNECT_INPUT_OPTIONS = ['-reconnect', '1', '-reconnect_streamed', '1', '-reconnect_delay_max', '5'];

interface ActiveStream {
  resource: AudioResource;
  command: FfmpegCommand;
  onComplete: StreamCompletion;
  error?: Error;
}

/**
 * Input options for a remote stream, with an optional start offset
 */
export function buildInputOptions(seekSeconds: number): string[] {
  const options = [...RECONNECT_INPUT_OPTIONS];
  if (seekSeconds > 0) {
    options.push('-ss', String(seekSeconds));
  }
  return options;
}

/**
 * One voice connection plus the audio player subscribed to it
 */
export class DiscordVoiceSession implements VoiceSession {
  private readonly player: AudioPlayer;
  private current: ActiveStream | null = null;
  private currentChannelId: string;

  constructor(
    private readonly connection: VoiceConnection,
    channelId: string,
    private readonly logger: Logger,
  ) {
    this.currentChannelId = channelId;
    this.player = createAudioPlayer({
      behaviors: {
        noSubscriber: NoSubscriberBehavior.Pause,
        maxMissedFrames: Math.round(5000 / 20),
      },
    });

    connection.subscribe(this.player);
    this.setupConnectionEvents();
    this.setupPlayerEvents();
  }

  get channelId(): string {
    return this.currentChannelId;
  }

  isConnected(): boolean {
    const status = this.connection.state.status;
    return status !== VoiceConnectionStatus.Destroyed && status !== VoiceConnectionStatus.Disconnected;
  }

  async moveTo(channel: VoiceChannelRef, timeoutMs: number): Promise<void> {
    const rejoined = this.connection.rejoin({ channelId: channel.id, selfDeaf: true, selfMute: false });
    if (!rejoined) {
      throw new Error(`Could not rejoin voice channel ${channel.id}`);
    }
    await entersState(this.connection, VoiceConnectionStatus.Ready, timeoutMs);
    this.currentChannelId = channel.id;
  }

  play(sourceUrl: string, options: StreamOptions, onComplete: StreamCompletion): void {
    this.stop();

    const output = new PassThrough();
    const command = ffmpeg(sourceUrl)
      .inputOptions(buildInputOptions(options.seekSeconds))
      .noVideo()
      .audioCodec('libopus')
      .audioFrequency(48000)
      .audioChannels(2)
      .outputFormat('webm');

    const resource = createAudioResource(output, {
      inputType: StreamType.WebmOpus,
      inlineVolume: true,
    });
    resource.volume?.setVolume(options.volume);

    const active: ActiveStream = { resource, command, onComplete };

    command.on('error', (error: Error) => {
      // Killing ffmpeg on stop also lands here
      if (this.current === active) {
        active.error = error;
        this.logger.warn('ffmpeg stream error', {
          category: LogCategory.MUSIC,
          error,
        });
      }
      output.end();
    });

    command.pipe(output, { end: true });
    this.current = active;
    this.player.play(resource);
  }

  setVolume(multiplier: number): void {
    this.current?.resource.volume?.setVolume(multiplier);
  }

  pause(): boolean {
    return this.player.pause();
  }

  resume(): boolean {
    return this.player.unpause();
  }

  /**
   * Halt without reporting completion for the halted stream
   */
  stop(): void {
    const active = this.current;
    this.current = null;
    if (active) {
      active.command.kill('SIGKILL');
    }
    this.player.stop(true);
  }

  async disconnect(): Promise<void> {
    this.stop();
    if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      this.connection.destroy();
    }
  }

  private finish(resource: AudioResource): void {
    const active = this.current;
    if (!active || active.resource !== resource) {
      return;
    }
    this.current = null;
    active.command.kill('SIGKILL');
    active.onComplete(active.error);
  }

  private setupPlayerEvents(): void {
    this.player.on('stateChange', (oldState, newState) => {
      if (newState.status === AudioPlayerStatus.Idle && oldState.status !== AudioPlayerStatus.Idle) {
        this.finish(oldState.resource);
      }
    });

    this.player.on('error', error => {
      const active = this.current;
      if (active && active.resource === error.resource) {
        active.error = error;
      }
      this.logger.warn('Audio player error', {
        category: LogCategory.MUSIC,
        error,
      });
    });
  }

  private setupConnectionEvents(): void {
    this.connection.on(VoiceConnectionStatus.Disconnected, async () => {
      try {
        // Moved between channels or a gateway hiccup: wait for the library to reconnect
        await Promise.race([
          entersState(this.connection, VoiceConnectionStatus.Signalling, RECONNECT_GRACE_MS),
          entersState(this.connection, VoiceConnectionStatus.Connecting, RECONNECT_GRACE_MS),
        ]);
      } catch {
        this.logger.warn('Voice connection lost, closing session', { category: LogCategory.MUSIC });
        this.stop();
        if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
          this.connection.destroy();
        }
      }
    });

    this.connection.on('error', error => {
      this.logger.error('Voice connection error', {
        category: LogCategory.MUSIC,
        error: ErrorHandler.toError(error),
      });
    });
  }
}

/**
 * Opens voice sessions through the discord.js gateway adapter
 */
export class DiscordVoiceTransport implements VoiceTransport {
  private readonly logger: Logger;

  constructor(
    private readonly client: Client,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger();
  }

  async connect(channel: VoiceChannelRef, timeoutMs: number): Promise<VoiceSession> {
    const guild = this.client.guilds.cache.get(channel.guildId);
    if (!guild) {
      throw new Error(`Guild ${channel.guildId} is not cached`);
    }

    const connection = joinVoiceChannel({
      channelId: channel.id,
      guildId: channel.guildId,
      adapterCreator: guild.voiceAdapterCreator as DiscordGatewayAdapterCreator,
      selfDeaf: true,
      selfMute: false,
    });

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, timeoutMs);
    } catch (error) {
      connection.destroy();
      throw new Error(`Voice connection to ${channel.name} was not ready within ${timeoutMs}ms`, {
        cause: ErrorHandler.toError(error),
      });
    }

    return new DiscordVoiceSession(connection, channel.id, this.logger);
  }
}
