import { CommandFieldError } from './errors';

export interface DeviceUser {
    pin: string;
    name: string;
    privilege?: number;
    card?: string;
}

/** Terminals store at most 24 characters of a user's name */
export const MAX_NAME_LENGTH = 24;

// Tabs separate fields and line breaks separate commands
export const COMMAND_SEPARATORS = /[\t\r\n]/;

function field(name: string, value: string): string {
    if (COMMAND_SEPARATORS.test(value)) {
        throw new CommandFieldError(name);
    }
    return value;
}

/**
 * `DATA USER` command enrolling or updating a user on the terminal.
 * The command id is the PIN so the result report can be matched by eye.
 */
export function buildAddUserCommand(user: DeviceUser): string {
    const pin = field('pin', user.pin);
    const name = field('name', user.name).slice(0, MAX_NAME_LENGTH);
    let command = `C:${pin}:DATA USER PIN=${pin}\tName=${name}\tPri=${user.privilege ?? 0}`;
    if (user.card) {
        command += `\tCard=${field('card', user.card)}`;
    }
    return command;
}

export function buildDeleteUserCommand(pin: string): string {
    const checked = field('pin', pin);
    return `C:${checked}:DATA DEL USER PIN=${checked}`;
}
