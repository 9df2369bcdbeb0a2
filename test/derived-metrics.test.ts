import { expect } from 'chai';
import { DerivedMetricsEngine } from '../src/derived/derived-metrics.js';
import { heatPumpIndicators, heatPumpMetrics } from '../src/derived/heat-pump-metrics.js';
import { SchemaError } from '../src/errors.js';
import { EntityStore } from '../src/store/entity-store.js';
import { DerivedMetricDefinition, EntityScalar } from '../src/types/modbus-types.js';

const NOW = 1_700_000_000_000;

function storeWith(values: Record<string, number>): EntityStore {
  const store = new EntityStore();
  for (const [id, value] of Object.entries(values)) {
    store.define({ id, unit: null, source: 'measured' });
    store.setValue(id, { raw: null, value, label: null }, NOW);
  }
  return store;
}

function metric(overrides: Partial<DerivedMetricDefinition> & Pick<DerivedMetricDefinition, 'id' | 'inputs'>): DerivedMetricDefinition {
  return {
    name: overrides.id,
    unit: null,
    predicate: () => true,
    formula: () => 1,
    ...overrides,
  };
}

describe('DerivedMetricsEngine', () => {
  let store: EntityStore;
  let engine: DerivedMetricsEngine;

  beforeEach(() => {
    store = storeWith({
      flow_rate: 20,
      flow_temp: 35,
      return_temp: 30,
      outdoor_temp: 5,
      power_consumption: 1500,
    });
    engine = new DerivedMetricsEngine(store);
  });

  describe('heat pump metrics', () => {
    beforeEach(() => {
      expect(engine.registerAll(heatPumpMetrics({ electricityRate: 0.3 }))).to.be.empty;
      engine.recomputeAll(NOW);
    });

    it('computes every metric from live inputs', () => {
      expect(store.get('thermal_output')?.value).to.be.closeTo(6.97667, 1e-5);
      expect(store.get('performance_ratio')?.value).to.be.closeTo(4.65111, 1e-5);
      expect(store.get('cop_estimate')?.value).to.be.closeTo(3.8, 1e-9);
      expect(store.get('daily_energy_estimate')?.value).to.equal(36);
      expect(store.get('daily_cost_estimate')?.value).to.be.closeTo(10.8, 1e-9);
      expect(store.get('weather_compensation_target')?.value).to.equal(55);
      expect(store.get('thermal_output')).to.deep.include({
        source: 'computed',
        availability: 'available',
        lastUpdated: NOW,
      });
    });

    it('orders metrics after the metrics they read', () => {
      const order = engine.ids;

      expect(order.indexOf('thermal_output')).to.be.lessThan(order.indexOf('performance_ratio'));
      expect(order.indexOf('daily_energy_estimate')).to.be.lessThan(
        order.indexOf('daily_cost_estimate')
      );
    });

    it('marks a metric unavailable when its predicate fails', () => {
      store.setValue('flow_temp', { raw: null, value: 28, label: null }, NOW);
      engine.onEntityUpdated('flow_temp', NOW);

      expect(store.get('thermal_output')).to.deep.include({
        availability: 'unavailable',
        reason: 'predicate-failed',
      });
      expect(store.get('performance_ratio')).to.deep.include({
        availability: 'unavailable',
        reason: 'input-unavailable',
      });
    });

    it('keeps the last value while unavailable', () => {
      store.setAvailability('outdoor_temp', 'unavailable', 'read-failures');
      engine.onEntityUpdated('outdoor_temp', NOW);

      expect(store.get('weather_compensation_target')).to.deep.include({
        value: 55,
        availability: 'unavailable',
        reason: 'input-unavailable',
      });
    });

    it('rejects implausible results', () => {
      store.setValue('flow_rate', { raw: null, value: 50, label: null }, NOW);
      store.setValue('flow_temp', { raw: null, value: 50, label: null }, NOW);
      engine.onEntitiesUpdated(['flow_rate', 'flow_temp'], NOW);

      expect(store.get('thermal_output')).to.deep.include({
        availability: 'unavailable',
        reason: 'out-of-range',
      });
    });

    it('only recomputes metrics downstream of the update', () => {
      store.setValue('outdoor_temp', { raw: null, value: 15, label: null }, NOW + 1000);
      const changed = engine.onEntityUpdated('outdoor_temp', NOW + 1000);

      expect(changed.map(v => v.id)).to.have.members(['cop_estimate', 'weather_compensation_target']);
      expect(store.get('weather_compensation_target')?.value).to.equal(44);
      expect(store.get('thermal_output')?.lastUpdated).to.equal(NOW);
    });
  });

  describe('heat pump indicators', () => {
    const indicators = [
      'compressor_running',
      'defrost_active',
      'heating_active',
      'dhw_active',
      'backup_heater_active',
      'frost_protection_active',
      'alarm_active',
    ];

    function indicatorValues(): Array<EntityScalar | null | undefined> {
      return indicators.map(id => store.get(id)?.value);
    }

    function update(values: Record<string, number>): void {
      for (const [id, value] of Object.entries(values)) {
        store.setValue(id, { raw: null, value, label: null }, NOW);
      }
      engine.onEntitiesUpdated(Object.keys(values), NOW);
    }

    beforeEach(() => {
      for (const id of ['compressor_frequency', 'dhw_mode', 'error_code']) {
        store.define({ id, unit: null, source: 'measured' });
        store.setValue(id, { raw: null, value: 0, label: null }, NOW);
      }
      expect(engine.registerAll(heatPumpIndicators())).to.be.empty;
      engine.recomputeAll(NOW);
    });

    it('derives boolean states from the current readings', () => {
      expect(indicatorValues()).to.deep.equal([true, true, true, false, false, false, false]);
      expect(store.get('compressor_running')).to.deep.include({
        source: 'computed',
        availability: 'available',
      });
    });

    it('follows changes in the readings', () => {
      update({
        compressor_frequency: 45,
        power_consumption: 6000,
        outdoor_temp: -8,
        dhw_mode: 1,
        flow_temp: 4,
        error_code: 5,
      });

      expect(indicatorValues()).to.deep.equal([true, false, false, true, true, true, true]);
    });

    it('needs more than one kelvin of lift to report heating', () => {
      update({ flow_temp: 31 });
      expect(store.get('heating_active')?.value).to.equal(false);

      update({ flow_temp: 31.5 });
      expect(store.get('heating_active')?.value).to.equal(true);
    });

    it('goes unavailable with its inputs', () => {
      store.setAvailability('error_code', 'unavailable', 'decode-error');
      engine.onEntityUpdated('error_code', NOW);

      expect(store.get('alarm_active')).to.deep.include({
        value: false,
        availability: 'unavailable',
        reason: 'input-unavailable',
      });
      expect(store.get('dhw_active')?.availability).to.equal('available');
    });
  });

  it('reports unknown while an input has never been read', () => {
    store.define({ id: 'fresh', unit: null, source: 'measured' });
    engine.register(metric({ id: 'double_fresh', inputs: ['fresh'], formula: i => (i.fresh ?? 0) * 2 }));
    engine.recomputeAll(NOW);

    expect(store.get('double_fresh')).to.deep.include({ availability: 'unknown', value: null });

    store.setValue('fresh', { raw: null, value: 4, label: null }, NOW);
    engine.onEntityUpdated('fresh', NOW);
    expect(store.get('double_fresh')?.value).to.equal(8);
  });

  it('rejects non-finite and throwing formulas', () => {
    engine.registerAll([
      metric({ id: 'divide', inputs: ['flow_rate'], formula: () => Number.POSITIVE_INFINITY }),
      metric({
        id: 'explode',
        inputs: ['flow_rate'],
        formula: () => {
          throw new Error('boom');
        },
      }),
    ]);
    engine.recomputeAll(NOW);

    expect(store.get('divide')?.reason).to.equal('out-of-range');
    expect(store.get('explode')?.reason).to.equal('out-of-range');
  });

  it('rejects metrics with unknown inputs and the metrics built on them', () => {
    const errors = engine.registerAll([
      metric({ id: 'orphan', inputs: ['missing_sensor'] }),
      metric({ id: 'downstream', inputs: ['orphan'] }),
      metric({ id: 'fine', inputs: ['flow_rate'] }),
    ]);

    expect(errors.map(e => e.entityId)).to.deep.equal(['orphan', 'downstream']);
    expect(errors[0]?.message).to.contain('unknown input "missing_sensor"');
    expect(engine.ids).to.deep.equal(['fine']);
    expect(store.has('orphan')).to.equal(false);
  });

  it('rejects dependency cycles', () => {
    const errors = engine.registerAll([
      metric({ id: 'a', inputs: ['b'] }),
      metric({ id: 'b', inputs: ['a'] }),
      metric({ id: 'c', inputs: ['a', 'flow_rate'] }),
      metric({ id: 'd', inputs: ['flow_rate'] }),
    ]);

    expect(errors.map(e => e.entityId)).to.deep.equal(['a', 'b', 'c']);
    expect(errors.every(e => e.message.includes('dependency cycle'))).to.equal(true);
    expect(engine.ids).to.deep.equal(['d']);
  });

  it('throws from register for a taken id', () => {
    expect(() => engine.register(metric({ id: 'flow_temp', inputs: ['flow_rate'] }))).to.throw(
      SchemaError,
      'id is already taken'
    );
  });

  it('feeds booleans to formulas as 0 or 1', () => {
    store.define({ id: 'pump_on', unit: null, source: 'measured' });
    store.setValue('pump_on', { raw: [1], value: true, label: null }, NOW);
    engine.register(metric({ id: 'pump_flag', inputs: ['pump_on'], formula: i => (i.pump_on ?? -1) + 10 }));
    engine.recomputeAll(NOW);

    expect(store.get('pump_flag')?.value).to.equal(11);
  });
});
