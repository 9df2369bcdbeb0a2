import { expect } from 'chai';
import sinon from 'sinon';
import { Logger } from '../src/logger.js';
import { LogRecord } from '../src/types/modbus-types.js';

const RESET = '\x1b[0m';

describe('Logger', () => {
  let log: Logger;
  let records: LogRecord[];

  beforeEach(() => {
    log = new Logger();
    records = [];
    log.watch(record => records.push(record));
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('records', () => {
    beforeEach(() => {
      log.setConsoleOutput(false);
    });

    it('hands every record at or above the level to the watcher', () => {
      log.debug('hidden');
      log.info('Connected', { entity: 'flow_temp' });
      log.error('Lost');

      expect(records).to.deep.equal([
        { level: 'info', args: ['Connected'], context: { entity: 'flow_temp' } },
        { level: 'error', args: ['Lost'], context: {} },
      ]);
    });

    it('stops handing records over once the watcher is cleared', () => {
      log.watch(null);
      log.warn('unseen');

      expect(records).to.be.empty;
    });

    it('takes only a trailing flat object as context', () => {
      const failure = new Error('boom');

      log.info('Read', 'block', { address: 100, quantity: 2 });
      log.info({ entity: 'flow_temp' });
      log.info('Nested', { block: { start: 0 } });
      log.info('Failed', failure);

      expect(records.map(r => [r.args, r.context])).to.deep.equal([
        [['Read', 'block'], { address: 100, quantity: 2 }],
        [[{ entity: 'flow_temp' }], {}],
        [['Nested', { block: { start: 0 } }], {}],
        [['Failed', failure], {}],
      ]);
    });

    it('tags records from a child logger with its name', () => {
      const child = log.createLogger('PollScheduler');

      child.info('Cycle done');
      child.warn('Block failed', { address: 100 });

      expect(records.map(r => r.context)).to.deep.equal([
        { logger: 'PollScheduler' },
        { address: 100, logger: 'PollScheduler' },
      ]);
      expect(records[1]?.args).to.deep.equal(['Block failed']);
    });

    it('applies a category level over the global one', () => {
      const scheduler = log.createLogger('PollScheduler');
      const writes = log.createLogger('WritePath');
      log.setLevel('warn');
      log.setLevelFor('PollScheduler', 'debug');

      scheduler.debug('verbose');
      writes.info('quiet');
      writes.warn('loud');

      expect(records.map(r => r.args[0])).to.deep.equal(['verbose', 'loud']);
    });

    it('silences a category set to none', () => {
      const scheduler = log.createLogger('PollScheduler');
      log.setLevelFor('PollScheduler', 'none');

      scheduler.error('dropped');
      log.error('kept');

      expect(records.map(r => r.args[0])).to.deep.equal(['kept']);
    });
  });

  describe('console output', () => {
    beforeEach(() => {
      sinon.useFakeTimers(Date.UTC(2026, 0, 1, 8, 30, 15));
    });

    it('prints a compact header and the fields it does not show as JSON', () => {
      const info = sinon.stub(console, 'info');
      const child = log.createLogger('Poll');

      child.info('Read done', {
        unitId: 1,
        funcCode: 0x04,
        address: 100,
        quantity: 2,
        responseTime: 12,
        entity: 'flow_temp',
      });

      expect(info.calledOnce).to.equal(true);
      expect(info.firstCall.args).to.deep.equal([
        '\x1b[1;32m[08:30:15][INFO][Poll][U:1][F:0x04/READ_INPUT_REGISTERS][A:100][Q:2][RT:12ms]',
        'Read done',
        '{"entity":"flow_temp"}',
        RESET,
      ]);
    });

    it('fills the header from the global context', () => {
      const warn = sinon.stub(console, 'warn');
      log.addGlobalContext({ unitId: 7 });

      log.warn('Slow reply', { responseTime: 250 });

      expect(warn.firstCall.args).to.deep.equal([
        '\x1b[1;33m[08:30:15][WARN][U:7][RT:250ms]',
        'Slow reply',
        RESET,
      ]);
    });

    it('highlights a device exception in the header', () => {
      const error = sinon.stub(console, 'error');

      log.error('Device refused', { funcCode: 0x03, exceptionCode: 2 });

      expect(error.firstCall.args).to.deep.equal([
        `\x1b[1;31m[08:30:15][ERROR][F:0x03/READ_HOLDING_REGISTERS]\x1b[1;41m[E:2/Illegal Data Address]${RESET}\x1b[1;31m`,
        'Device refused',
        RESET,
      ]);
    });

    it('prints trace records through console.debug', () => {
      const debug = sinon.stub(console, 'debug');
      log.setLevel('trace');

      log.trace('tick');

      expect(debug.firstCall.args).to.deep.equal(['\x1b[1;35m[08:30:15][TRACE]', 'tick', RESET]);
    });

    it('prints an error argument with its stack', () => {
      const error = sinon.stub(console, 'error');

      log.error(new Error('boom'));

      const printed = error.firstCall.args[1];
      expect(printed).to.be.a('string');
      expect(String(printed).startsWith('boom\nError: boom')).to.equal(true);
    });

    it('prints nothing once console output is off', () => {
      const info = sinon.stub(console, 'info');
      log.setConsoleOutput(false);

      log.info('quiet');

      expect(info.called).to.equal(false);
      expect(records).to.have.length(1);
    });
  });
});
