import { Command } from '../types/command';
import play from './music/play';
import search from './music/search';
import pause from './music/pause';
import resume from './music/resume';
import skip from './music/skip';
import stop from './music/stop';
import seek from './music/seek';
import volume from './music/volume';
import queue from './music/queue';
import nowplaying from './music/nowplaying';
import remove from './music/remove';
import move from './music/move';
import clear from './music/clear';
import shuffle from './music/shuffle';
import loop from './music/loop';
import previous from './music/previous';
import jump from './music/jump';
import join from './music/join';
import leave from './music/leave';
import playlist from './playlist/playlist';
import ping from './general/ping';
import help from './general/help';
import info from './general/info';
import sync from './admin/sync';

/**
 * Every slash command the bot registers
 */
export function loadCommands(): Command[] {
  return [
    play,
    search,
    pause,
    resume,
    skip,
    stop,
    seek,
    volume,
    queue,
    nowplaying,
    remove,
    move,
    clear,
    shuffle,
    loop,
    previous,
    jump,
    join,
    leave,
    playlist,
    ping,
    help,
    info,
    sync,
  ];
}
