/**
 * Password Policy
 */

import { randomInt } from 'node:crypto';
import type { PasswordPolicy } from '../../domain/index.js';

/** Letters and digits that cannot be mistaken for one another */
const PASSWORD_SYMBOLS = '23456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

export interface PasswordPolicyConfig {
	readonly length: number;
}

/**
 * Create a policy generating random passwords of a fixed length.
 */
export function createPasswordPolicy(config: PasswordPolicyConfig): PasswordPolicy {
	const { length } = config;
	return {
		generate(): string {
			let password = '';
			for (let i = 0; i < length; i++) {
				password += PASSWORD_SYMBOLS.charAt(randomInt(PASSWORD_SYMBOLS.length));
			}
			return password;
		},
	};
}
