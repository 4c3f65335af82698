export class QueueCapacityError extends Error {
    constructor(
        public readonly deviceSn: string,
        public readonly capacity: number
    ) {
        super(`Command queue for device ${deviceSn} is full (${capacity} pending)`);
        this.name = 'QueueCapacityError';
    }
}

export class NoDeviceError extends Error {
    constructor() {
        super('No devices connected');
        this.name = 'NoDeviceError';
    }
}

export class InvalidDeviceError extends Error {
    constructor(public readonly deviceSn: string) {
        super(`Cannot queue commands for device "${deviceSn}": terminals without a serial number never poll`);
        this.name = 'InvalidDeviceError';
    }
}

export class CommandFieldError extends Error {
    constructor(public readonly field: string) {
        super(`${field} must not contain tabs or line breaks`);
        this.name = 'CommandFieldError';
    }
}

export class DeadlineExceededError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`Timed out after ${timeoutMs} ms`);
        this.name = 'DeadlineExceededError';
    }
}
