/**
 * Local pronunciation audio
 *
 * Audio files are named after the JMdict sequence number of their word
 * (1358280.mp3); anything else in the folder is ignored.
 */

import fs from 'fs';
import path from 'path';
import { dp } from '@kotoba-deck/core';

const AUDIO_NAME_REGEX = /^(\d+)\.[A-Za-z0-9]+$/;

export function scanAudioFolder(folder: string): Map<number, string> {
  const audio = new Map<number, string>();
  if (!fs.existsSync(folder)) {
    dp(`No audio folder at ${folder}`);
    return audio;
  }

  for (const name of fs.readdirSync(folder).sort()) {
    const match = AUDIO_NAME_REGEX.exec(name);
    if (!match) {
      dp(`Ignoring audio file ${name}`);
      continue;
    }
    const seq = Number(match[1]);
    if (!audio.has(seq)) {
      audio.set(seq, path.join(folder, name));
    }
  }
  return audio;
}
