import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { CommandRouter } from '../../../src/router/commandRouter.js';
import { SafetyGate } from '../../../src/safety/gate.js';
import { IpmiTransport } from '../../../src/transport/ipmi.js';
import { BmcError, BmcErrorCode } from '../../../src/shared/errors.js';
import type {
  IpmiOutput,
  RedfishRequest,
  RedfishResponse,
  ShellOutput,
} from '../../../src/transport/types.js';
import type { RiskLevel } from '../../../src/types/risk.js';
import type { Target } from '../../../src/types/target.js';
import {
  DELL,
  FakeExecutor,
  FakeNotifier,
  FakeResolver,
  ScriptedTransport,
  SUPERMICRO,
  UNKNOWN,
} from '../../helpers/fakes.js';

const WEB01_TOKEN = '1f94fe445b';
const STOR095 = 'STOR095 : Storage operation is successfully completed.';

function ipmiOk(command: string, output: string): IpmiOutput {
  return { command, output, exitCode: 0, timedOut: false };
}

function shellOk(command: string, output: string): ShellOutput {
  return { command, output, exitCode: 0 };
}

function redfishReply(status: number, body: unknown): RedfishResponse {
  return { status, path: '/', body, text: JSON.stringify(body) };
}

interface Setup {
  targets?: Record<string, Target | BmcError>;
  ipmi?: (IpmiOutput | BmcError)[];
  shell?: (ShellOutput | BmcError)[];
  redfish?: (RedfishResponse | BmcError)[];
  notifier?: FakeNotifier;
  threshold?: RiskLevel;
}

function setup(options: Setup = {}) {
  const resolver = new FakeResolver(options.targets ?? { web01: DELL, web02: SUPERMICRO, web03: UNKNOWN });
  const ipmi = new ScriptedTransport<string, IpmiOutput>('ipmi', options.ipmi);
  const shell = new ScriptedTransport<string, ShellOutput>('shell', options.shell);
  const redfish = new ScriptedTransport<RedfishRequest, RedfishResponse>('redfish', options.redfish);
  const notifier = options.notifier ?? new FakeNotifier();
  const router = new CommandRouter({
    resolver,
    transports: { ipmi, shell, redfish },
    gate: new SafetyGate({ confirmation_threshold: options.threshold ?? 'critical' }),
    notifier,
    config: DEFAULT_CONFIG,
  });
  const transportCalls = () => ipmi.calls.length + shell.calls.length + redfish.calls.length;
  return { router, resolver, ipmi, shell, redfish, notifier, transportCalls };
}

describe('CommandRouter', () => {
  describe('inventory failures', () => {
    it('aborts with NOT_FOUND and no transport call', async () => {
      const t = setup({ targets: { ghost: new BmcError(BmcErrorCode.NOT_FOUND, "no inventory record matches 'ghost'") } });

      const result = await t.router.run('ghost', { kind: 'power' });

      expect(result).toEqual({
        success: false,
        operation: 'power',
        hostname: 'ghost',
        message: "ghost: no inventory record matches 'ghost'",
        lines: [],
        rawOutput: '',
        errorKind: BmcErrorCode.NOT_FOUND,
      });
      expect(t.transportCalls()).toBe(0);
    });

    it.each(['power', 'drive_status', 'nvme_status'] as const)('aborts %s with AMBIGUOUS and no transport call', async (kind) => {
      const t = setup({ targets: { web: new BmcError(BmcErrorCode.AMBIGUOUS, 'matches 2 records') } });

      const result = await t.router.run('web', { kind });

      expect(result.errorKind).toBe(BmcErrorCode.AMBIGUOUS);
      expect(t.transportCalls()).toBe(0);
    });
  });

  describe('IPMI queries', () => {
    it('reads the power state', async () => {
      const t = setup({ ipmi: [ipmiOk('chassis power status', 'Chassis Power is on\n')] });

      const result = await t.router.run('web01', { kind: 'power' });

      expect(t.ipmi.calls.map((c) => c.payload)).toEqual(['chassis power status']);
      expect(t.ipmi.calls[0]?.target).toBe(DELL);
      expect(result.success).toBe(true);
      expect(result.message).toBe('web01: Chassis Power is on');
      expect(result.errorKind).toBeNull();
    });

    it.each([
      ['health', 'sensor'],
      ['sel', 'sel elist'],
      ['poweron', 'chassis power on'],
    ] as const)('sends %s as %p', async (kind, command) => {
      const t = setup({ ipmi: [ipmiOk(command, 'line one\nline two')] });
      const result = await t.router.run('web01', { kind });
      expect(t.ipmi.calls[0]?.payload).toBe(command);
      expect(result.lines).toEqual(['line one', 'line two']);
    });

    it('reports transport errors without structured fields', async () => {
      const t = setup({ ipmi: [new BmcError(BmcErrorCode.UNREACHABLE, '10.0.0.9 does not answer ping (100% packet loss)')] });

      const result = await t.router.run('web01', { kind: 'health' });

      expect(result.success).toBe(false);
      expect(result.errorKind).toBe(BmcErrorCode.UNREACHABLE);
      expect(result.message).toBe('web01: 10.0.0.9 does not answer ping (100% packet loss)');
      expect(result.structuredFields).toBeUndefined();
    });

    it('propagates errors that are not BmcErrors', async () => {
      const t = setup({ ipmi: [] });
      await expect(t.router.run('web01', { kind: 'power' })).rejects.toThrow('unexpected ipmi call');
    });
  });

  describe('boot', () => {
    it('resolves the host, then rejects a missing mode without a transport call', async () => {
      const t = setup();

      const result = await t.router.run('web01', { kind: 'boot' });

      expect(t.resolver.calls).toEqual(['web01']);
      expect(result.errorKind).toBe(BmcErrorCode.INVALID_ARGUMENT);
      expect(result.message).toBe('web01: usage: boot <host> <pxe|bios>');
      expect(t.transportCalls()).toBe(0);
    });

    it('rejects modes other than pxe and bios', async () => {
      const t = setup();
      const result = await t.router.run('web01', { kind: 'boot', mode: 'disk' });
      expect(result.errorKind).toBe(BmcErrorCode.INVALID_ARGUMENT);
      expect(t.transportCalls()).toBe(0);
    });

    it('sets the boot device, then the boot flag', async () => {
      const t = setup({
        ipmi: [
          ipmiOk('chassis bootdev pxe', 'Set Boot Device to pxe'),
          ipmiOk('chassis bootparam set bootflag force_pxe', 'Set Boot Flag to force_pxe'),
        ],
      });

      const result = await t.router.run('web01', { kind: 'boot', mode: 'pxe' });

      expect(t.ipmi.calls.map((c) => c.payload)).toEqual(['chassis bootdev pxe', 'chassis bootparam set bootflag force_pxe']);
      expect(result.success).toBe(true);
      expect(result.message).toBe('web01: next boot set to pxe');
      expect(result.rawOutput).toBe('Set Boot Device to pxe\nSet Boot Flag to force_pxe');
    });

    it('still attempts the second step when the first fails, and reports the failure', async () => {
      const t = setup({
        ipmi: [
          new BmcError(BmcErrorCode.PROTOCOL_ERROR, 'Set Boot Device to bios failed'),
          ipmiOk('chassis bootparam set bootflag force_bios', 'Set Boot Flag to force_bios'),
        ],
      });

      const result = await t.router.run('web01', { kind: 'boot', mode: 'bios' });

      expect(t.ipmi.calls).toHaveLength(2);
      expect(result.success).toBe(false);
      expect(result.errorKind).toBe(BmcErrorCode.PROTOCOL_ERROR);
      expect(result.message).toBe("web01: 'chassis bootdev bios' failed: Set Boot Device to bios failed");
      expect(result.lines).toEqual(['chassis bootdev bios: Set Boot Device to bios failed']);
    });
  });

  describe('reboot and kdump', () => {
    it('rejects a wrong token before any lookup or transport call', async () => {
      const t = setup();

      const result = await t.router.run('web01', { kind: 'reboot', reason: 'disk swap' }, { magic: 'abcdefabcd' });

      expect(result.errorKind).toBe(BmcErrorCode.BAD_CONFIRMATION);
      expect(result.message).toBe('web01: confirmation token does not match');
      expect(t.resolver.calls).toEqual([]);
      expect(t.transportCalls()).toBe(0);
    });

    it('names the expected token when none was given', async () => {
      const t = setup();
      const result = await t.router.run('web01', { kind: 'kdump', reason: 'hung' });
      expect(result.message).toBe(`web01: kdump requires confirmation: rerun with magic ${WEB01_TOKEN}`);
    });

    it('requires a reason', async () => {
      const t = setup();
      const result = await t.router.run('web01', { kind: 'reboot' }, { magic: WEB01_TOKEN });
      expect(result.errorKind).toBe(BmcErrorCode.MISSING_REASON);
      expect(t.transportCalls()).toBe(0);
    });

    it('power-cycles and notifies the fleet service', async () => {
      const t = setup({ ipmi: [ipmiOk('chassis power cycle', 'Chassis Power Control: Cycle')] });

      const result = await t.router.run('web01', { kind: 'reboot', reason: 'disk swap' }, { magic: WEB01_TOKEN });

      expect(t.ipmi.calls.map((c) => c.payload)).toEqual(['chassis power cycle']);
      expect(t.notifier.calls).toEqual([{ hostId: 'web01', reason: 'disk swap' }]);
      expect(result.success).toBe(true);
      expect(result.message).toBe('web01: Chassis Power Control: Cycle');
    });

    it('succeeds even when the notification fails', async () => {
      const t = setup({
        ipmi: [ipmiOk('chassis power diag', 'Chassis Power Control: Diag')],
        notifier: new FakeNotifier(new Error('connection refused')),
      });

      const result = await t.router.run('web01', { kind: 'kdump', reason: 'hung' }, { magic: WEB01_TOKEN });

      expect(t.ipmi.calls[0]?.payload).toBe('chassis power diag');
      expect(t.notifier.calls).toHaveLength(1);
      expect(result.success).toBe(true);
    });

    it('does not notify when the power call failed', async () => {
      const t = setup({ ipmi: [new BmcError(BmcErrorCode.TIMED_OUT, "IPMI command 'chassis power cycle' timed out")] });

      const result = await t.router.run('web01', { kind: 'reboot', reason: 'disk swap' }, { magic: WEB01_TOKEN });

      expect(result.errorKind).toBe(BmcErrorCode.TIMED_OUT);
      expect(t.notifier.calls).toEqual([]);
    });
  });

  describe('drive_locate', () => {
    it('blinks a Dell drive bay through RACADM', async () => {
      const command = 'racadm storage blink:Disk.Bay.3:Enclosure.Internal.0-1:RAID.Integrated.1-1';
      const t = setup({ shell: [shellOk(command, STOR095)] });

      const result = await t.router.run('web01', { kind: 'drive_locate', state: 'on', slot: '3' });

      expect(t.shell.calls.map((c) => c.payload)).toEqual([command]);
      expect(result.success).toBe(true);
      expect(result.message).toBe('web01: Drive in Slot 3 sucessfully set to blink.');
    });

    it('rejects non-Dell hosts with no transport call', async () => {
      const t = setup();

      const result = await t.router.run('web02', { kind: 'drive_locate', state: 'on', slot: '1' });

      expect(result.errorKind).toBe(BmcErrorCode.UNSUPPORTED_MANUFACTURER);
      expect(result.message).toBe('web02: drive_locate requires a Dell BMC (inventory says Supermicro)');
      expect(t.transportCalls()).toBe(0);
    });

    it.each(['x', '-1', '1.5', ''])('rejects slot %p before the lookup', async (slot) => {
      const t = setup();
      const result = await t.router.run('web01', { kind: 'drive_locate', state: 'on', slot });
      expect(result.errorKind).toBe(BmcErrorCode.INVALID_ARGUMENT);
      expect(t.resolver.calls).toEqual([]);
      expect(t.transportCalls()).toBe(0);
    });

    it('rejects an unknown LED state', async () => {
      const t = setup();
      const result = await t.router.run('web01', { kind: 'drive_locate', state: 'maybe', slot: '1' });
      expect(result.message).toBe('web01: usage: drive_locate <host> <on|off> <slot>');
      expect(t.transportCalls()).toBe(0);
    });

    it('reports success for repeated unblink calls', async () => {
      const command = 'racadm storage unblink:Disk.Bay.2:Enclosure.Internal.0-1:RAID.Integrated.1-1';
      const t = setup({ shell: [shellOk(command, STOR095), shellOk(command, STOR095)] });

      const first = await t.router.run('web01', { kind: 'drive_locate', state: 'off', slot: '2' });
      const second = await t.router.run('web01', { kind: 'drive_locate', state: 'off', slot: '2' });

      expect(first.message).toBe('web01: Drive in Slot 2 sucessfully set to unblink.');
      expect(second).toEqual(first);
    });

    it('fails when RACADM does not print the success marker', async () => {
      const t = setup({ shell: [shellOk('racadm', 'ERROR: STOR0102 : The physical disk is not found.')] });

      const result = await t.router.run('web01', { kind: 'drive_locate', state: 'on', slot: '9' });

      expect(result.errorKind).toBe(BmcErrorCode.PROTOCOL_ERROR);
      expect(result.message).toBe('web01: ERROR: STOR0102 : The physical disk is not found.');
      expect(result.rawOutput).toBe('ERROR: STOR0102 : The physical disk is not found.');
    });
  });

  describe('drive_status', () => {
    const listing = (bays: number[]) =>
      bays
        .map((bay) => `Disk.Bay.${bay}:Enclosure.Internal.0-1:RAID.Integrated.1-1\n   State = Online\n   Size = 1.75 TB\n   SerialNumber = SN${bay}`)
        .join('\n');

    it('lists drives and warns on an odd count', async () => {
      const t = setup({ shell: [shellOk('racadm', listing([0, 1, 2]))] });

      const result = await t.router.run('web01', { kind: 'drive_status' });

      expect(t.shell.calls[0]?.payload).toBe('racadm storage get pdisks -o -p State,Size,SerialNumber');
      expect(result.success).toBe(true);
      expect(result.message).toBe('web01: 3 drives');
      expect(result.structuredFields?.warning).toBe('WARNING: odd number of drives detected (3)');
      expect(result.lines).toEqual([
        'Disk.Bay.0  Online  1.75 TB  SN0',
        'Disk.Bay.1  Online  1.75 TB  SN1',
        'Disk.Bay.2  Online  1.75 TB  SN2',
        'WARNING: odd number of drives detected (3)',
      ]);
    });

    it('does not warn on an even count', async () => {
      const t = setup({ shell: [shellOk('racadm', listing([0, 1]))] });
      const result = await t.router.run('web01', { kind: 'drive_status' });
      expect(result.structuredFields?.warning).toBeUndefined();
    });

    it('fails on a non-zero exit status', async () => {
      const t = setup({ shell: [{ command: 'racadm', output: 'ERROR: Unable to perform the requested operation.', exitCode: 1 }] });
      const result = await t.router.run('web01', { kind: 'drive_status' });
      expect(result.success).toBe(false);
      expect(result.structuredFields).toBeUndefined();
    });

    it('fails when the remote command ends without an exit status', async () => {
      const truncated = 'Disk.Bay.0:Enclosure.Internal.0-1:RAID.Integrated.1-1\n   State = Online\nDisk.Bay.1:Encl';
      const t = setup({ shell: [{ command: 'racadm', output: truncated, exitCode: null }] });

      const result = await t.router.run('web01', { kind: 'drive_status' });

      expect(result.success).toBe(false);
      expect(result.errorKind).toBe(BmcErrorCode.PROTOCOL_ERROR);
      expect(result.message).toBe('web01: remote command ended without an exit status');
      expect(result.rawOutput).toBe(truncated);
      expect(result.structuredFields).toBeUndefined();
    });
  });

  describe('nvme_status', () => {
    const drive = {
      Id: 'Disk.Bay.0:Enclosure.Internal.0-1',
      Model: 'TEST NVME',
      CapacityBytes: 1920383410176,
      Status: { State: 'Enabled', Health: 'OK' },
    };

    it('reads the Dell drive collection', async () => {
      const t = setup({ redfish: [redfishReply(200, { Members: [drive] })] });

      const result = await t.router.run('web01', { kind: 'nvme_status' });

      expect(t.redfish.calls[0]?.payload).toEqual({
        method: 'GET',
        path: '/redfish/v1/Systems/System.Embedded.1/Storage/CPU.1/Drives?$expand=*($levels=1)',
      });
      expect(result.message).toBe('web01: 1 NVMe drives');
      expect(result.lines).toEqual(['Disk.Bay.0:Enclosure.Internal.0-1  TEST NVME  Enabled  1.92 TB  OK']);
    });

    it('reports an empty projection as success', async () => {
      const t = setup({ redfish: [redfishReply(200, { Members: [] })] });

      const result = await t.router.run('web02', { kind: 'nvme_status' });

      expect(t.redfish.calls[0]?.payload.path).toBe('/redfish/v1/Chassis/NVMeSSD.0.StorageBackplane/Drives?$expand=*($levels=1)');
      expect(result.success).toBe(true);
      expect(result.message).toBe('web02: no compatible drives found');
    });

    it('rejects unknown vendors with no transport call', async () => {
      const t = setup();
      const result = await t.router.run('web03', { kind: 'nvme_status' });
      expect(result.message).toBe('web03: nvme_status requires a Dell or Supermicro BMC (inventory says Unknown)');
      expect(t.transportCalls()).toBe(0);
    });
  });

  describe('nvme_locate', () => {
    it('posts the blink action for a Dell bay', async () => {
      const t = setup({ redfish: [redfishReply(200, {})] });

      const result = await t.router.run('web01', { kind: 'nvme_locate', state: 'on', slot: '2' });

      expect(t.redfish.calls[0]?.payload.body).toEqual({ TargetFQDD: 'Disk.Bay.2:Enclosure.Internal.0-1' });
      expect(result.message).toBe('web01: NVMe drive in Slot 2 sucessfully set to blink.');
    });

    it('rejects Supermicro hosts with no transport call', async () => {
      const t = setup();
      const result = await t.router.run('web02', { kind: 'nvme_locate', state: 'on', slot: '2' });
      expect(result.errorKind).toBe(BmcErrorCode.UNSUPPORTED_MANUFACTURER);
      expect(t.transportCalls()).toBe(0);
    });

    it('surfaces the vendor extended message on a non-200 answer', async () => {
      const body = { error: { '@Message.ExtendedInfo': [{ Message: 'Unable to locate the target disk.' }] } };
      const t = setup({ redfish: [redfishReply(400, body)] });

      const result = await t.router.run('web01', { kind: 'nvme_locate', state: 'off', slot: '7' });

      expect(result.errorKind).toBe(BmcErrorCode.PROTOCOL_ERROR);
      expect(result.message).toBe('web01: Unable to locate the target disk.');
    });

    it('reports the bare status when the answer has no error body', async () => {
      const t = setup({ redfish: [redfishReply(202, null)] });
      const result = await t.router.run('web01', { kind: 'nvme_locate', state: 'on', slot: '7' });
      expect(result.message).toBe('web01: HTTP 202');
    });

    it('rejects a non-numeric slot before the lookup', async () => {
      const t = setup();
      const result = await t.router.run('web01', { kind: 'nvme_locate', state: 'on', slot: 'two' });
      expect(result.errorKind).toBe(BmcErrorCode.INVALID_ARGUMENT);
      expect(t.resolver.calls).toEqual([]);
    });
  });

  describe('with the IPMI transport', () => {
    it('does not repeat a power cycle while diagnosing a session failure', async () => {
      const executor = new FakeExecutor([
        { stdout: '2 packets transmitted, 2 received, 0% packet loss, time 1001ms' },
        { stderr: 'Error: Unable to establish IPMI v2 / RMCP+ session', exitCode: 1 },
        { stdout: 'Chassis Power is on' },
      ]);
      const notifier = new FakeNotifier();
      const router = new CommandRouter({
        resolver: new FakeResolver({ web01: DELL }),
        transports: {
          ipmi: new IpmiTransport(executor, DEFAULT_CONFIG, { ipmiPassword: 'test-secret' }),
          shell: new ScriptedTransport<string, ShellOutput>('shell'),
          redfish: new ScriptedTransport<RedfishRequest, RedfishResponse>('redfish'),
        },
        gate: new SafetyGate({ confirmation_threshold: 'critical' }),
        notifier,
        config: DEFAULT_CONFIG,
      });

      const result = await router.run('web01', { kind: 'reboot', reason: 'disk swap' }, { magic: WEB01_TOKEN });

      expect(executor.calls).toHaveLength(3);
      expect(executor.calls[1]?.command.argv.slice(-3)).toEqual(['chassis', 'power', 'cycle']);
      expect(executor.calls[2]?.command.argv.slice(-4)).toEqual(['-vvv', 'chassis', 'power', 'status']);
      expect(result.errorKind).toBe(BmcErrorCode.PROTOCOL_ERROR);
      expect(notifier.calls).toEqual([]);
    });
  });

  describe('confirmation threshold', () => {
    it('gates moderate operations when lowered', async () => {
      const t = setup({ threshold: 'moderate' });
      const result = await t.router.run('web01', { kind: 'poweron' });
      expect(result.errorKind).toBe(BmcErrorCode.BAD_CONFIRMATION);
      expect(t.resolver.calls).toEqual([]);
    });
  });
});
