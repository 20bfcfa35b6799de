export const DEVICE_WATCH_INTERVAL_MS = 2000;

export const MOUNTS_PATH = '/proc/mounts';

export const LSBLK_COLUMNS = ['NAME', 'SIZE', 'TYPE', 'TRAN', 'RM', 'RO', 'VENDOR', 'MODEL'] as const;
