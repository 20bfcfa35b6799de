export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(`${command} exited with ${exitCode === null ? 'a signal' : `code ${exitCode}`}${stderr ? `: ${stderr}` : ''}`);
    this.name = 'CommandError';
  }
}

export class DeviceMountedError extends Error {
  constructor(
    readonly device: string,
    readonly mountpoints: string[]
  ) {
    super(`${device} is mounted on ${mountpoints.join(', ')}`);
    this.name = 'DeviceMountedError';
  }
}

export class SourceDeviceError extends Error {
  constructor(
    readonly device: string,
    readonly imagePath: string
  ) {
    super(`${device} holds the image ${imagePath}`);
    this.name = 'SourceDeviceError';
  }
}
