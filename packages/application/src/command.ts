/**
 * Command Types
 *
 * Commands represent the validated input to write operations (mutations).
 * They are plain data objects that carry the intent and data for a use case.
 *
 * Conventions:
 * - Commands are named after the operation: CreateServer, UpdateServer
 * - Commands are immutable (readonly properties)
 * - Commands carry no validation logic; they are the product of validation
 *
 * @example
 * ```typescript
 * interface UpdateServerCommand extends Command {
 *     readonly serverId: string;
 *     readonly displayName?: string; // undefined = no change
 * }
 * ```
 */

/**
 * Base marker interface for commands.
 */
export interface Command {
	/**
	 * Optional operation type identifier, used in logs.
	 */
	readonly _type?: string;
}

