/**
 * useFlasher Hook - Follows a Flasher's monitor reports from React
 */

import { useCallback, useEffect, useState } from 'react';
import type { Flasher, FlashTarget, LoadResult, MonitorReport, StartFlashOptions } from '@multiflash/flasher';
import { errorMessage } from '@multiflash/flasher';

export type FlasherHandle = Pick<Flasher, 'watch' | 'selectImage' | 'startFlash'>;

export function useFlasher(flasher: FlasherHandle) {
  const [report, setReport] = useState<MonitorReport | null>(null);
  const [error, setError] = useState<string | null>(null);
  // The monitor stops itself after reporting completion; bumping this restarts it.
  const [generation, setGeneration] = useState(0);

  useEffect(() => flasher.watch(setReport, (err) => setError(err.message)), [flasher, generation]);

  const selectImage = useCallback(
    async (imagePath: string): Promise<LoadResult | null> => {
      setError(null);
      setGeneration((g) => g + 1);
      try {
        const result = await flasher.selectImage(imagePath);
        if (!result.success) {
          setError(result.error.message);
        }
        return result;
      } catch (err) {
        setError(errorMessage(err));
        return null;
      }
    },
    [flasher]
  );

  const startFlash = useCallback(
    (targets: readonly FlashTarget[], options?: StartFlashOptions) => {
      setError(null);
      try {
        flasher.startFlash(targets, options);
        setGeneration((g) => g + 1);
      } catch (err) {
        setError(errorMessage(err));
      }
    },
    [flasher]
  );

  return {
    report,
    error,
    selectImage,
    startFlash,
    isFlashing: report?.kind === 'flashing',
  };
}
