/**
 * Flasher UI Components - React views over flash sessions and target disks
 */

export * from './components/DeviceCard';
export * from './components/ProgressBar';
export * from './components/TaskProgressList';
export * from './components/ImageStatus';
export * from './components/FlashSummary';
export * from './hooks/useDevice';
export * from './hooks/useFlasher';
export * from './lib/utils';
