/** A device frame that cannot be applied as a whole tick */
export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameError';
  }
}

/** Control command could not be delivered to the device bridge */
export class DeviceBridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeviceBridgeError';
  }
}
