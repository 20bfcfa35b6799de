/**
 * useDevice Hook - React hook for listing flashable disks
 */

import { useCallback, useEffect, useRef, useState } from 'react';
import type { BlockDevice, DeviceSource } from '@multiflash/device-manager';
import { errorMessage } from '@multiflash/flasher';

export function useDevice(source: DeviceSource) {
  const [devices, setDevices] = useState<BlockDevice[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);
  const mounted = useRef(true);

  const refresh = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      const found = await source.listTargets();
      if (mounted.current) {
        setDevices(found);
      }
    } catch (err) {
      if (mounted.current) {
        setError(errorMessage(err) || 'Failed to list devices');
      }
    } finally {
      if (mounted.current) {
        setLoading(false);
      }
    }
  }, [source]);

  useEffect(() => {
    mounted.current = true;
    refresh().catch((err: unknown) => setError(errorMessage(err)));
    return () => {
      mounted.current = false;
    };
  }, [refresh]);

  return {
    devices,
    loading,
    error,
    refresh,
  };
}
