import fs from 'fs';
import path from 'path';
import { PublishError, errorMessage } from './errors';

/**
 * Replace `destination` with a copy of `sourceDir`.
 *
 * The copy is staged beside the destination and renamed into place, so the
 * destination is never observed empty or half-written. Whatever was there
 * before is removed.
 */
export function publishTree(sourceDir: string, destination: string): void {
  const parent = path.dirname(destination);
  if (!fs.existsSync(parent)) {
    throw new PublishError(`Publish destination parent does not exist: ${parent}`);
  }

  const stamp    = `${process.pid}-${Date.now()}`;
  const staging  = `${destination}.staging-${stamp}`;
  const previous = `${destination}.previous-${stamp}`;

  try {
    fs.mkdirSync(staging);
    fs.cpSync(sourceDir, staging, { recursive: true });
  } catch (err) {
    fs.rmSync(staging, { recursive: true, force: true });
    throw new PublishError(`Could not stage ${sourceDir} for publishing: ${errorMessage(err)}`, { cause: err });
  }

  const hadPrevious = fs.existsSync(destination);
  try {
    if (hadPrevious) fs.renameSync(destination, previous);
    fs.renameSync(staging, destination);
  } catch (err) {
    if (hadPrevious && fs.existsSync(previous) && !fs.existsSync(destination)) {
      fs.renameSync(previous, destination);
    }
    fs.rmSync(staging, { recursive: true, force: true });
    throw new PublishError(`Could not replace ${destination}: ${errorMessage(err)}`, { cause: err });
  }

  fs.rmSync(previous, { recursive: true, force: true });
}
