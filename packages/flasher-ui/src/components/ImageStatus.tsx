/**
 * Image Status - What the image buffer holds while no session is running
 */

import type { MonitorReport } from '@multiflash/flasher';
import { formatBytes } from '@multiflash/flasher';
import { AlertCircle, FileImage, Loader2 } from 'lucide-react';

export type ImageReport = Extract<MonitorReport, { kind: 'empty' | 'loading' | 'ready' | 'invalidated' }>;

export interface ImageStatusProps {
  report: ImageReport;
}

export function ImageStatus({ report }: ImageStatusProps) {
  switch (report.kind) {
    case 'loading':
      return (
        <div className="flex items-center text-gray-700" aria-busy="true">
          <Loader2 className="w-4 h-4 mr-2 animate-spin" />
          <span>Loading {report.path}</span>
        </div>
      );
    case 'ready':
      return (
        <div className="flex items-center text-gray-900">
          <FileImage className="w-4 h-4 mr-2" />
          <span className="font-medium">{report.image.name}</span>
          <span className="ml-2 text-sm text-gray-500">{formatBytes(report.image.size)}</span>
        </div>
      );
    case 'invalidated':
      return (
        <div className="flex items-center text-red-700" role="alert">
          <AlertCircle className="w-4 h-4 mr-2" />
          <span>{report.error ? report.error.message : 'Image could not be loaded'}</span>
        </div>
      );
    case 'empty':
      return <div className="text-gray-500">No image selected</div>;
  }
}
