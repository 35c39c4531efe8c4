import * as fs from 'fs';
import { CaptureLog } from '../captureLog.service';
import { errorMessage } from '../../utils/errors';

/**
 * Copy the placeholder image to `targetPath`. Resolves to false (and logs why)
 * instead of rejecting.
 */
export const writePlaceholderPhoto = async (
  placeholderImagePath: string,
  targetPath: string,
  log: CaptureLog
): Promise<boolean> => {
  log.addLine(`Creating placeholder photo file: ${targetPath}`);
  try {
    await fs.promises.copyFile(placeholderImagePath, targetPath);
    log.addLine(`Placeholder photo copied from ${placeholderImagePath} to: ${targetPath}`);
    return true;
  } catch (error) {
    log.addLine(`Failed to copy placeholder photo: ${errorMessage(error)}`);
    return false;
  }
};
