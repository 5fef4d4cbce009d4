import { describe, expect, it } from 'vitest';
import { parseCreateServerCommand, type CreateServerParseOptions, type RequestBody } from '../application/index.js';
import {
	BASE_URL,
	NETWORK_A,
	NETWORK_B,
	adminContext,
	failureOf,
	fixedPasswordPolicy,
	userContext,
	valueOf,
} from './fixtures.js';

const options: CreateServerParseOptions = { baseUrl: BASE_URL, passwordPolicy: fixedPasswordPolicy };

function withServer(fields: RequestBody): RequestBody {
	return { server: { name: 'web-1', imageRef: 'cirros-0.3', flavorRef: '2', ...fields } };
}

function parse(body: RequestBody, opts: CreateServerParseOptions = options) {
	return parseCreateServerCommand(body, userContext(), opts);
}

describe('parseCreateServerCommand', () => {
	it('builds a command with defaults for a minimal body', () => {
		const command = valueOf(parse({ server: { name: ' web-1 ', imageRef: 'cirros-0.3', flavorRef: '2' } }));

		expect(command).toEqual({
			_type: 'CreateServer',
			displayName: 'web-1',
			displayDescription: 'web-1',
			imageRef: 'cirros-0.3',
			flavorId: '2',
			adminPassword: 'generated-pass',
			metadata: {},
			injectedFiles: [],
			securityGroups: ['default'],
			requestedNetworks: null,
			reservationId: null,
			returnReservationId: false,
			minCount: 1,
			maxCount: 1,
		});
	});

	describe('entity checks', () => {
		it('cannot process an empty body or one without a server', () => {
			for (const body of [{}, { instance: {} }]) {
				expect(failureOf(parse(body))).toMatchObject({
					type: 'unprocessable',
					message: 'Unable to process the contained instructions',
				});
			}
		});

		it('rejects a server entity that is not a mapping', () => {
			expect(failureOf(parse({ server: 'web-1' }))).toMatchObject({
				type: 'validation',
				message: 'Malformed server entity',
			});
		});

		it('reports only the first violation', () => {
			expect(failureOf(parse({ server: { name: 5, flavorRef: '' } })).message).toBe(
				'Server name is not a string or unicode',
			);
		});
	});

	describe('adminPass', () => {
		it('keeps a supplied password', () => {
			expect(valueOf(parse(withServer({ adminPass: 'test-secret' }))).adminPassword).toBe('test-secret');
		});

		it('generates a password when null', () => {
			expect(valueOf(parse(withServer({ adminPass: null }))).adminPassword).toBe('generated-pass');
		});

		it('rejects an empty or non-string password', () => {
			expect(failureOf(parse(withServer({ adminPass: '' }))).message).toBe('Invalid adminPass');
			expect(failureOf(parse(withServer({ adminPass: 1234 }))).message).toBe('Invalid adminPass');
		});
	});

	describe('name', () => {
		it.each([
			[undefined, 'Server name is not defined'],
			[42, 'Server name is not a string or unicode'],
			['   ', 'Server name is an empty string'],
		])('rejects %j', (name, message) => {
			expect(failureOf(parse(withServer({ name }))).message).toBe(message);
		});
	});

	describe('imageRef', () => {
		it('requires an image reference', () => {
			expect(failureOf(parse(withServer({ imageRef: undefined }))).message).toBe('Missing imageRef attribute');
			expect(failureOf(parse(withServer({ imageRef: '' }))).message).toBe('Missing imageRef attribute');
		});

		it('reduces a reference under the own base URL to the image id', () => {
			const imageRef = `${BASE_URL}/project-1/images/ubuntu-11.10`;
			expect(valueOf(parse(withServer({ imageRef }))).imageRef).toBe('ubuntu-11.10');
		});

		it('passes a foreign reference through', () => {
			const imageRef = 'http://images.example.org/v1/images/77';
			expect(valueOf(parse(withServer({ imageRef }))).imageRef).toBe(imageRef);
		});

		it('accepts a numeric id', () => {
			expect(valueOf(parse(withServer({ imageRef: 7 }))).imageRef).toBe('7');
		});
	});

	describe('personality', () => {
		it('decodes base64 contents', () => {
			const command = valueOf(parse(withServer({ personality: [{ path: '/etc/motd', contents: 'aGVsbG8=' }] })));

			expect(command.injectedFiles).toHaveLength(1);
			expect(command.injectedFiles[0]?.path).toBe('/etc/motd');
			expect(command.injectedFiles[0]?.contents.toString('utf8')).toBe('hello');
		});

		it('names the missing key', () => {
			expect(failureOf(parse(withServer({ personality: [{ contents: 'aGVsbG8=' }] }))).message).toBe(
				'Bad personality format: missing path',
			);
			expect(failureOf(parse(withServer({ personality: [{ path: '/etc/motd' }] }))).message).toBe(
				'Bad personality format: missing contents',
			);
		});

		it('rejects a personality that is not a list', () => {
			expect(failureOf(parse(withServer({ personality: 'files' }))).message).toBe('Bad personality format');
		});

		it('rejects contents that are not base64', () => {
			expect(
				failureOf(parse(withServer({ personality: [{ path: '/etc/motd', contents: 'not base64!' }] }))).message,
			).toBe('Personality content for /etc/motd cannot be decoded');
		});
	});

	describe('security_groups', () => {
		it('drops duplicates and unnamed groups keeping first-seen order', () => {
			const groups = [{ name: 'web' }, { name: 'db' }, { name: 'web' }, {}, { name: '' }];
			expect(valueOf(parse(withServer({ security_groups: groups }))).securityGroups).toEqual(['web', 'db']);
		});

		it('passes blank names on to the orchestrator', () => {
			const groups = [{ name: ' ' }, { name: 'web' }];
			expect(valueOf(parse(withServer({ security_groups: groups }))).securityGroups).toEqual([' ', 'web']);
		});

		it('falls back to the default group', () => {
			expect(valueOf(parse(withServer({ security_groups: [] }))).securityGroups).toEqual(['default']);
		});

		it('rejects groups that are not a list', () => {
			expect(failureOf(parse(withServer({ security_groups: 'web' }))).message).toBe('Bad security_groups format');
		});
	});

	describe('networks', () => {
		it('keeps the network id and fixed address', () => {
			const networks = [{ uuid: NETWORK_A, fixed_ip: '10.0.0.5' }, { uuid: NETWORK_B }];
			expect(valueOf(parse(withServer({ networks }))).requestedNetworks).toEqual([
				{ networkId: NETWORK_A, fixedIp: '10.0.0.5' },
				{ networkId: NETWORK_B },
			]);
		});

		it('rejects a network requested twice', () => {
			const networks = [{ uuid: NETWORK_A }, { uuid: NETWORK_A, fixed_ip: '10.0.0.6' }];
			expect(failureOf(parse(withServer({ networks }))).message).toBe(
				`Duplicate networks (${NETWORK_A}) are not allowed`,
			);
		});

		it('requires a uuid in proper format', () => {
			expect(failureOf(parse(withServer({ networks: [{ fixed_ip: '10.0.0.5' }] }))).message).toBe(
				'Bad network format: missing uuid',
			);
			expect(failureOf(parse(withServer({ networks: [{ uuid: 'net-1' }] }))).message).toBe(
				'Bad networks format: network uuid is not in proper format (net-1)',
			);
		});

		it('rejects an invalid fixed address', () => {
			expect(failureOf(parse(withServer({ networks: [{ uuid: NETWORK_A, fixed_ip: '10.0.0.300' }] }))).message).toBe(
				'Invalid fixed IP address (10.0.0.300)',
			);
		});

		it('rejects networks that are not a list', () => {
			expect(failureOf(parse(withServer({ networks: NETWORK_A }))).message).toBe('Bad networks format');
		});
	});

	describe('flavorRef', () => {
		it('requires a flavor reference', () => {
			expect(failureOf(parse(withServer({ flavorRef: undefined }))).message).toBe('Missing flavorRef attribute');
		});

		it('takes the id from the end of a URL', () => {
			expect(valueOf(parse(withServer({ flavorRef: `${BASE_URL}/project-1/flavors/3` }))).flavorId).toBe('3');
		});

		it('rejects a reference ending without an id', () => {
			expect(failureOf(parse(withServer({ flavorRef: 'http://localhost/flavors/' }))).message).toBe(
				'Invalid flavorRef provided.',
			);
			expect(failureOf(parse(withServer({ flavorRef: { id: 3 } }))).message).toBe('Invalid flavorRef provided.');
		});
	});

	it('rejects user data that is not base64', () => {
		expect(failureOf(parse(withServer({ user_data: 'bad data' }))).message).toBe('Userdata content cannot be decoded');
		expect(valueOf(parse(withServer({ user_data: 'aGVsbG8=' }))).userData).toBe('aGVsbG8=');
	});

	describe('reservation id', () => {
		it('ignores a reservation id from a non-admin caller', () => {
			expect(valueOf(parse(withServer({ reservation_id: 'r-custom' }))).reservationId).toBeNull();
		});

		it('honours a reservation id from an admin', () => {
			const command = valueOf(parseCreateServerCommand(withServer({ reservation_id: 'r-custom' }), adminContext(), options));
			expect(command.reservationId).toBe('r-custom');
		});

		it('treats an empty reservation id as absent', () => {
			const command = valueOf(parseCreateServerCommand(withServer({ reservation_id: '' }), adminContext(), options));
			expect(command.reservationId).toBeNull();
		});

		it('reads return_reservation_id as a flag', () => {
			expect(valueOf(parse(withServer({ return_reservation_id: 'True' }))).returnReservationId).toBe(true);
			expect(valueOf(parse(withServer({ return_reservation_id: '0' }))).returnReservationId).toBe(false);
		});
	});

	describe('counts', () => {
		it('lowers min_count to max_count', () => {
			const command = valueOf(parse(withServer({ min_count: 3, max_count: 2 })));
			expect([command.minCount, command.maxCount]).toEqual([2, 2]);
		});

		it('defaults max_count to min_count', () => {
			const command = valueOf(parse(withServer({ min_count: '4' })));
			expect([command.minCount, command.maxCount]).toEqual([4, 4]);
		});

		it('treats a zero count as absent', () => {
			const command = valueOf(parse(withServer({ min_count: 0, max_count: 3 })));
			expect([command.minCount, command.maxCount]).toEqual([1, 3]);
		});

		it('rejects counts below one or not integers', () => {
			expect(failureOf(parse(withServer({ min_count: '0' }))).message).toBe('Invalid min_count value');
			expect(failureOf(parse(withServer({ max_count: 'many' }))).message).toBe('Invalid max_count value');
		});
	});

	it('rejects metadata with non-string values', () => {
		expect(failureOf(parse(withServer({ metadata: { replicas: 3 } }))).message).toBe(
			'Unable to parse metadata key/value pairs.',
		);
	});

	it('rejects a non-string key_name', () => {
		expect(failureOf(parse(withServer({ key_name: 5 }))).message).toBe('Invalid key_name');
	});

	it('maps optional fields onto the command', () => {
		const command = valueOf(
			parse(
				withServer({
					key_name: 'deploy',
					availability_zone: 'zone-a',
					accessIPv4: '192.0.2.10',
					auto_disk_config: 'True',
					config_drive: true,
				}),
			),
		);

		expect(command).toMatchObject({
			keyName: 'deploy',
			availabilityZone: 'zone-a',
			accessIpV4: '192.0.2.10',
			autoDiskConfig: true,
			configDrive: true,
		});
	});

	it('derives a block device mapping through the hook', () => {
		const withHook: CreateServerParseOptions = {
			...options,
			blockDeviceMapping: (server) => server['block_device_mapping'],
		};
		const mapping = [{ device_name: 'vda', volume_id: 'vol-1' }];

		expect(valueOf(parse(withServer({ block_device_mapping: mapping }), withHook)).blockDeviceMapping).toEqual(mapping);
		expect(valueOf(parse(withServer({}), withHook))).not.toHaveProperty('blockDeviceMapping');
	});
});
