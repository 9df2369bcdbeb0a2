// src/derived/heat-pump-metrics.ts

import { DEFAULTS, WATER_SPECIFIC_HEAT } from '../constants/constants.js';
import { DerivedMetricDefinition, MetricInputs } from '../types/modbus-types.js';

export interface HeatPumpMetricOptions {
  /** Price of one kWh. */
  electricityRate?: number;
}

// Rule-of-thumb COP: best case minus a penalty per kelvin of lift.
const COP_AT_ZERO_LIFT = 6.8;
const COP_PENALTY_PER_KELVIN = 0.1;
const COP_FLOOR = 1;

// Weather compensation curve.
const INDOOR_TARGET = 21;
const BASE_FLOW_TEMP = 35;
const CURVE_SLOPE = 1.5;
const MAX_FLOW_TEMP = 55;

const HOURS_PER_DAY = 24;

// Status indicator thresholds.
const COMPRESSOR_POWER_W = 200;
const DEFROST_MAX_OUTDOOR = 5;
const HEATING_MIN_DELTA = 1;
const BACKUP_HEATER_MAX_OUTDOOR = -5;
const BACKUP_HEATER_POWER_W = 5000;
const FROST_MIN_FLOW = 5;

function input(inputs: MetricInputs, id: string): number {
  return inputs[id] ?? Number.NaN;
}

/**
 * Metrics for an air-to-water heat pump. They read `flow_rate` (a local
 * input in L/min), the flow, return and outdoor temperatures, and the
 * electrical power draw in W.
 */
export function heatPumpMetrics(options: HeatPumpMetricOptions = {}): DerivedMetricDefinition[] {
  const rate = options.electricityRate ?? DEFAULTS.ELECTRICITY_RATE;

  return [
    {
      id: 'thermal_output',
      name: 'Thermal Output',
      unit: 'kW',
      inputs: ['flow_rate', 'flow_temp', 'return_temp'],
      predicate: i => input(i, 'flow_rate') > 0 && input(i, 'flow_temp') > input(i, 'return_temp'),
      // L/min ~ kg/min of water; kg/s * kJ/(kg.K) * K = kW
      formula: i =>
        (input(i, 'flow_rate') / 60) *
        WATER_SPECIFIC_HEAT *
        (input(i, 'flow_temp') - input(i, 'return_temp')),
      range: { min: 0, max: 50 },
    },
    {
      id: 'performance_ratio',
      name: 'Performance Ratio',
      unit: null,
      inputs: ['thermal_output', 'power_consumption'],
      predicate: i => input(i, 'power_consumption') > 0,
      formula: i => input(i, 'thermal_output') / (input(i, 'power_consumption') / 1000),
      range: { min: 0, max: 15 },
    },
    {
      id: 'cop_estimate',
      name: 'Estimated COP',
      unit: null,
      inputs: ['flow_temp', 'outdoor_temp'],
      predicate: i => input(i, 'flow_temp') - input(i, 'outdoor_temp') > 0,
      formula: i =>
        Math.max(
          COP_AT_ZERO_LIFT -
            (input(i, 'flow_temp') - input(i, 'outdoor_temp')) * COP_PENALTY_PER_KELVIN,
          COP_FLOOR
        ),
    },
    {
      id: 'daily_energy_estimate',
      name: 'Daily Energy Estimate',
      unit: 'kWh',
      inputs: ['power_consumption'],
      predicate: i => input(i, 'power_consumption') >= 0,
      formula: i => (input(i, 'power_consumption') / 1000) * HOURS_PER_DAY,
    },
    {
      id: 'daily_cost_estimate',
      name: 'Daily Cost Estimate',
      unit: null,
      inputs: ['daily_energy_estimate'],
      predicate: () => true,
      formula: i => input(i, 'daily_energy_estimate') * rate,
    },
    {
      id: 'weather_compensation_target',
      name: 'Weather Compensation Target',
      unit: '°C',
      inputs: ['outdoor_temp'],
      predicate: () => true,
      formula: i =>
        Math.min(
          BASE_FLOW_TEMP + Math.max(INDOOR_TARGET - input(i, 'outdoor_temp'), 0) * CURVE_SLOPE,
          MAX_FLOW_TEMP
        ),
    },
  ];
}

/**
 * On/off status indicators inferred from other readings. Each one is
 * unavailable while any of its inputs is.
 */
export function heatPumpIndicators(): DerivedMetricDefinition[] {
  const always = (): boolean => true;
  return [
    {
      id: 'compressor_running',
      name: 'Compressor Running',
      unit: null,
      inputs: ['compressor_frequency', 'power_consumption'],
      predicate: always,
      formula: i =>
        input(i, 'compressor_frequency') > 0 || input(i, 'power_consumption') > COMPRESSOR_POWER_W,
    },
    {
      id: 'defrost_active',
      name: 'Defrost Active',
      unit: null,
      inputs: ['outdoor_temp', 'compressor_frequency'],
      predicate: always,
      // The compressor pauses while the coil defrosts.
      formula: i =>
        input(i, 'outdoor_temp') <= DEFROST_MAX_OUTDOOR && input(i, 'compressor_frequency') === 0,
    },
    {
      id: 'heating_active',
      name: 'Heating Active',
      unit: null,
      inputs: ['dhw_mode', 'flow_temp', 'return_temp'],
      predicate: always,
      formula: i =>
        input(i, 'dhw_mode') === 0 &&
        input(i, 'flow_temp') > input(i, 'return_temp') + HEATING_MIN_DELTA,
    },
    {
      id: 'dhw_active',
      name: 'DHW Active',
      unit: null,
      inputs: ['dhw_mode'],
      predicate: always,
      formula: i => input(i, 'dhw_mode') > 0,
    },
    {
      id: 'backup_heater_active',
      name: 'Backup Heater Active',
      unit: null,
      inputs: ['outdoor_temp', 'power_consumption'],
      predicate: always,
      formula: i =>
        input(i, 'outdoor_temp') < BACKUP_HEATER_MAX_OUTDOOR &&
        input(i, 'power_consumption') > BACKUP_HEATER_POWER_W,
    },
    {
      id: 'frost_protection_active',
      name: 'Frost Protection Active',
      unit: null,
      inputs: ['outdoor_temp', 'flow_temp'],
      predicate: always,
      formula: i => input(i, 'outdoor_temp') < 0 || input(i, 'flow_temp') < FROST_MIN_FLOW,
    },
    {
      id: 'alarm_active',
      name: 'Alarm Active',
      unit: null,
      inputs: ['error_code'],
      predicate: always,
      formula: i => input(i, 'error_code') > 0,
    },
  ];
}
