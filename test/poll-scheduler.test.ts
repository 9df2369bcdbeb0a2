import { expect } from 'chai';
import sinon from 'sinon';
import { BlockData } from '../src/codec/decoder.js';
import { DerivedMetricsEngine } from '../src/derived/derived-metrics.js';
import { ModbusExceptionError, ModbusNotConnectedError, PollSchedulerError } from '../src/errors.js';
import { planBlocks } from '../src/planner/block-planner.js';
import { PollScheduler, PollSchedulerOptions } from '../src/polling/poll-scheduler.js';
import { EntityStore } from '../src/store/entity-store.js';
import { ConnectionManager } from '../src/transport/connection-manager.js';
import { PollBlock } from '../src/types/modbus-types.js';
import { WritePath } from '../src/write/write-path.js';
import { coil, holdingRegister, inputRegister } from './helpers/descriptors.js';
import { DeviceEmulator } from './helpers/device-emulator.js';

const descriptors = [
  inputRegister('return_temp', 0, { encoding: 'signed' }),
  inputRegister('flow_temp', 1, { encoding: 'signed' }),
  holdingRegister('flow_setpoint', 2, { encoding: 'signed', scale: [1, 10] }),
  coil('system_enable', 0),
];
const { blocks } = planBlocks(descriptors);

describe('PollScheduler', () => {
  let device: DeviceEmulator;
  let connection: ConnectionManager;
  let writes: WritePath;
  let reads: Array<{ block: PollBlock; data: BlockData }>;
  let failures: Array<{ block: PollBlock; error: Error }>;

  function schedulerWith(overrides: Partial<PollSchedulerOptions> = {}): PollScheduler {
    return new PollScheduler(connection, blocks, writes, {
      intervalMs: 10000,
      onBlockRead: (block, data) => reads.push({ block, data }),
      onBlockFailed: (block, error) => failures.push({ block, error }),
      ...overrides,
    });
  }

  beforeEach(async () => {
    device = new DeviceEmulator(1);
    device.setInputRegisters(0, [30, 35]);
    device.setHoldingRegister(2, 450);
    device.setCoil(0, true);
    connection = new ConnectionManager({
      host: '127.0.0.1',
      port: 502,
      unitId: 1,
      requestTimeoutMs: 50,
      connectTimeoutMs: 50,
      protocolErrorLimit: 3,
      backoff: { minDelayMs: 10000, maxDelayMs: 60000 },
      transportFactory: device.factory,
    });
    const store = new EntityStore();
    store.define({ id: 'flow_setpoint', unit: null, source: 'measured' });
    writes = new WritePath(connection, store, new DerivedMetricsEngine(store), descriptors, [], {
      maxQueuedWrites: 8,
    });
    reads = [];
    failures = [];
    await connection.start();
  });

  afterEach(async () => {
    await connection.stop();
  });

  it('rejects a non-positive interval', () => {
    expect(() => schedulerWith({ intervalMs: 0 })).to.throw(PollSchedulerError);
  });

  it('reads every block once per cycle', async () => {
    const succeeded = sinon.spy(connection, 'markCycleSucceeded');
    const scheduler = schedulerWith();

    const result = await scheduler.runCycle();

    expect(result).to.deep.include({ blocksRead: 3, blocksFailed: 0, aborted: false });
    expect(reads.map(r => r.data)).to.deep.equal([
      { type: 'registers', words: [30, 35] },
      { type: 'registers', words: [450] },
      { type: 'coils', bits: [true] },
    ]);
    expect(succeeded.calledOnce).to.equal(true);
    expect(scheduler.getStats()).to.deep.include({ totalCycles: 1, successfulCycles: 1 });
  });

  it('skips the cycle while disconnected', async () => {
    await connection.stop();
    const scheduler = schedulerWith();

    expect(await scheduler.runCycle()).to.equal(null);
    expect(scheduler.getStats().skippedCycles).to.equal(1);
    expect(device.requests).to.be.empty;
  });

  it('drops a tick that arrives while a cycle is running', async () => {
    const scheduler = schedulerWith();

    const first = scheduler.runCycle();
    const second = await scheduler.runCycle();
    await first;

    expect(second).to.equal(null);
    expect(scheduler.getStats()).to.deep.include({ totalCycles: 1, droppedTicks: 1 });
  });

  it('isolates a block the device refuses', async () => {
    const succeeded = sinon.spy(connection, 'markCycleSucceeded');
    device.setException(0x03, 2, 0x02);
    const scheduler = schedulerWith();

    const result = await scheduler.runCycle();

    expect(result).to.deep.include({ blocksRead: 2, blocksFailed: 1, aborted: false });
    expect(failures).to.have.length(1);
    expect(failures[0]?.block.space).to.equal('holding');
    expect(failures[0]?.error).to.be.instanceOf(ModbusExceptionError);
    expect(succeeded.called).to.equal(false);
  });

  it('abandons the cycle when the connection fails', async () => {
    device.dropResponses(1);
    const scheduler = schedulerWith();

    const result = await scheduler.runCycle();

    expect(result).to.deep.include({ blocksRead: 0, blocksFailed: 1, aborted: true });
    expect(device.requests).to.have.length(1);
    expect(connection.state.kind).to.equal('backoff');
  });

  it('sends queued writes before the first read', async () => {
    const scheduler = schedulerWith();
    const pending = writes.setValue('flow_setpoint', 40);

    await scheduler.runCycle();
    await pending;

    expect(device.requests.map(r => r.functionCode)).to.deep.equal([0x06, 0x04, 0x03, 0x01]);
  });

  it('sends writes queued during a cycle between reads', async () => {
    let pending: Promise<unknown> | null = null;
    const scheduler = schedulerWith({
      onBlockRead: block => {
        if (block.space === 'input') pending = writes.setValue('flow_setpoint', 40);
      },
    });

    await scheduler.runCycle();
    await pending;

    expect(device.requests.map(r => r.functionCode)).to.deep.equal([0x04, 0x06, 0x03, 0x01]);
  });

  it('sends writes at once when no cycle is running', async () => {
    schedulerWith();

    const result = await writes.setValue('flow_setpoint', 40);

    expect(result.raw).to.deep.equal([400]);
    expect(device.requests.map(r => r.functionCode)).to.deep.equal([0x06]);
  });

  it('leaves queued writes to the owner once stopped', async () => {
    const scheduler = schedulerWith();
    scheduler.start();
    const cycle = scheduler.runCycle();
    const pending = writes.setValue('flow_setpoint', 40).catch((err: unknown) => err);

    await scheduler.stop();
    await cycle;

    expect(writes.pending).to.equal(1);
    expect(device.requests).to.be.empty;

    writes.rejectAll(new ModbusNotConnectedError('Poller stopped'));
    expect(await pending).to.be.instanceOf(ModbusNotConnectedError);
  });

  describe('timer', () => {
    let clock: sinon.SinonFakeTimers;

    beforeEach(() => {
      clock = sinon.useFakeTimers();
    });

    afterEach(() => {
      clock.restore();
    });

    it('runs the first cycle at once and then one per interval', async () => {
      const scheduler = schedulerWith();

      scheduler.start();
      await clock.tickAsync(0);
      expect(scheduler.getStats().totalCycles).to.equal(1);

      await clock.tickAsync(9999);
      expect(scheduler.getStats().totalCycles).to.equal(1);

      await clock.tickAsync(1);
      expect(scheduler.getStats().totalCycles).to.equal(2);

      await scheduler.stop();
      await clock.tickAsync(20000);
      expect(scheduler.getStats().totalCycles).to.equal(2);
      expect(scheduler.isRunning).to.equal(false);
    });

    it('runs one extra cycle on refresh', async () => {
      const scheduler = schedulerWith();
      scheduler.start();
      await clock.tickAsync(0);

      scheduler.requestRefresh();
      scheduler.requestRefresh();
      await clock.tickAsync(0);

      expect(scheduler.getStats().totalCycles).to.equal(2);
      await scheduler.stop();
    });
  });
});
