/**
 * Flasher Package - Image buffering, parallel device writes and progress monitoring
 */

export * from './types';
export * from './constants';
export * from './errors';
export * from './logger';
export * from './state-machine';
export * from './image-buffer';
export * from './image-source';
export * from './image-loader';
export * from './sample-ring';
export * from './flash-task';
export * from './writer';
export * from './error-collector';
export * from './flash-session';
export * from './flash-monitor';
export * from './format';
export * from './checksum';
export * from './transports/block-device-writer';
export * from './flasher';
