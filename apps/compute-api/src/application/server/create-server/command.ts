/**
 * Create Server Command
 */

import type { Command } from '@computegate/application';
import type { InstanceCreateFields } from '../../../domain/index.js';

export interface CreateServerCommand extends Command, InstanceCreateFields {
	readonly imageRef: string;
	readonly flavorId: string;
	/** Respond with the reservation id instead of the server */
	readonly returnReservationId: boolean;
}
