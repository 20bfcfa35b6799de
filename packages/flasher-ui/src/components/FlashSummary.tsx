/**
 * Flash Summary - Result line and the devices that failed
 */

import type { MonitorReport } from '@multiflash/flasher';
import { AlertCircle, CheckCircle2 } from 'lucide-react';
import { cn } from '../lib/utils';

export interface FlashSummaryProps {
  report: Extract<MonitorReport, { kind: 'complete' }>;
}

export function FlashSummary({ report }: FlashSummaryProps) {
  const allSucceeded = report.errors.length === 0;
  const Icon = allSucceeded ? CheckCircle2 : AlertCircle;

  return (
    <div
      className={cn(
        'border-2 rounded-lg p-4',
        allSucceeded ? 'bg-green-50 border-green-200 text-green-800' : 'bg-orange-50 border-orange-200 text-orange-800'
      )}
    >
      <div className="flex items-center">
        <Icon className="w-5 h-5 mr-2" />
        <span className="font-medium">{report.summary}</span>
      </div>
      {!allSucceeded && (
        <ul className="mt-3 space-y-1 text-sm">
          {report.errors.map(({ deviceId, reason }) => (
            <li key={deviceId}>
              <span className="font-mono">{deviceId}</span>: {reason.message}
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
