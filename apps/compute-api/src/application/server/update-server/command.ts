/**
 * Update Server Command
 */

import type { Command } from '@computegate/application';
import type { InstancePatch } from '../../../domain/index.js';

export interface UpdateServerCommand extends Command, InstancePatch {
	readonly serverId: string;
}
