/**
 * Device Card - A removable disk that can be picked as a flash target
 */

import type { BlockDevice } from '@multiflash/device-manager';
import { formatBytes } from '@multiflash/flasher';
import { HardDrive, Usb } from 'lucide-react';
import { cn } from '../lib/utils';

export interface DeviceCardProps {
  device: BlockDevice;
  selected: boolean;
  disabled?: boolean;
  onToggle?: (path: string) => void;
}

export function DeviceCard({ device, selected, disabled = false, onToggle }: DeviceCardProps) {
  const Icon = device.transport === 'usb' ? Usb : HardDrive;
  const name = [device.vendor, device.model].filter(Boolean).join(' ') || 'Removable disk';

  return (
    <label
      className={cn(
        'flex items-center gap-4 bg-white rounded-lg border p-4 shadow-sm',
        selected ? 'border-blue-500' : 'border-gray-200',
        disabled && 'opacity-50'
      )}
    >
      <input
        type="checkbox"
        checked={selected}
        disabled={disabled}
        onChange={() => onToggle?.(device.path)}
        aria-label={device.path}
      />
      <Icon className="w-5 h-5 text-gray-600" />
      <div>
        <h3 className="text-lg font-semibold text-gray-900">{name}</h3>
        <p className="text-sm text-gray-500 mt-1">
          {device.path} · {formatBytes(device.size)}
        </p>
      </div>
    </label>
  );
}
