/**
 * Progress Bar - Shows image load or device write progress
 */

import { cn } from '../lib/utils';

export interface ProgressBarProps {
  fraction: number; // 0-1
  message?: string;
  detail?: string;
  showPercentage?: boolean;
  animated?: boolean;
  tone?: 'active' | 'success' | 'error';
}

export function ProgressBar({
  fraction,
  message,
  detail,
  showPercentage = true,
  animated = true,
  tone = 'active',
}: ProgressBarProps) {
  const percent = Math.max(0, Math.min(100, fraction * 100));

  return (
    <div className="w-full">
      {message && (
        <div className="flex items-center justify-between mb-2">
          <span className="text-sm font-medium text-gray-700">{message}</span>
          <span className="text-sm text-gray-600">
            {showPercentage && <span>{Math.floor(percent)}%</span>}
            {detail && <span className="ml-2">{detail}</span>}
          </span>
        </div>
      )}
      <div
        className="w-full bg-gray-200 rounded-full h-2.5 overflow-hidden"
        role="progressbar"
        aria-valuemin={0}
        aria-valuemax={100}
        aria-valuenow={Math.floor(percent)}
        aria-label={message}
      >
        <div
          className={cn(
            'h-full rounded-full transition-all duration-300',
            animated && 'ease-out',
            tone === 'active' && 'bg-blue-600',
            tone === 'success' && 'bg-green-600',
            tone === 'error' && 'bg-red-600'
          )}
          style={{ width: `${percent}%` }}
        />
      </div>
    </div>
  );
}
