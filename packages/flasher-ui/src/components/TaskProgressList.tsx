/**
 * Task Progress List - One progress bar per target device, in session order
 */

import type { FlashError, TaskSnapshot } from '@multiflash/flasher';
import { CheckCircle2, AlertCircle } from 'lucide-react';
import { ProgressBar } from './ProgressBar';

export interface TaskProgressListProps {
  tasks: readonly TaskSnapshot[];
  /** Known failures; only available once the session has drained */
  errors?: readonly FlashError[];
}

export function TaskProgressList({ tasks, errors = [] }: TaskProgressListProps) {
  const failed = new Set(errors.map((e) => e.deviceId));

  return (
    <ul className="space-y-4">
      {tasks.map((task) => {
        const hasFailed = failed.has(task.deviceId);
        return (
          <li key={task.deviceId} className="flex items-center gap-3" data-device={task.deviceId}>
            <div className="flex-1">
              <ProgressBar
                fraction={task.fraction}
                message={task.label}
                detail={task.finished ? undefined : task.rate}
                tone={hasFailed ? 'error' : task.finished ? 'success' : 'active'}
              />
            </div>
            {task.finished &&
              (hasFailed ? (
                <AlertCircle className="w-5 h-5 text-red-600" aria-label="failed" />
              ) : (
                <CheckCircle2 className="w-5 h-5 text-green-600" aria-label="done" />
              ))}
          </li>
        );
      })}
    </ul>
  );
}
