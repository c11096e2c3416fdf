import { describe, it, expect } from '@jest/globals';
import type { RandomSourcePort } from '@evsim/domain';
import { DeterministicClock } from '@evsim/adapters';
import { MotorModel, expectedPower } from '../services/scooter/motor.model.js';
import { BatteryModel, voltageAtLevel } from '../services/scooter/battery.model.js';
import { ThermalModel } from '../services/scooter/thermal.model.js';

const HOUR_MS = 3_600_000;

function frozenClock(): DeterministicClock {
  return new DeterministicClock(Date.UTC(2024, 0, 1, 12), 0);
}

function constant(value: number): RandomSourcePort {
  return { next: () => value };
}

// ─── MotorModel ───────────────────────────────────────────────────────────────

describe('MotorModel', () => {
  it('follows the target speed with a 2 s lag', () => {
    const clock = frozenClock();
    const motor = new MotorModel({ clock, ambientTemperature: () => 25 });
    motor.setTargetSpeed(20);

    clock.advance(2_000);
    expect(motor.getState().speed).toBeCloseTo(20 * (1 - Math.exp(-1)), 6);
  });

  it('reports steady-state power, rpm and efficiency at 20 km/h', () => {
    const clock = frozenClock();
    const motor = new MotorModel({ clock, ambientTemperature: () => 25 });
    motor.setTargetSpeed(20);

    clock.advance(200_000);
    const state = motor.getState();
    expect(state.speed).toBeCloseTo(20, 6);
    expect(state.power).toBeCloseTo(400, 6);
    expect(state.rpm).toBeCloseTo(417.71, 2);
    expect(state.efficiency).toBeCloseTo(0.9 - 0.1 * (400 / 1337.5), 6);
    expect(state.temperature).toBeGreaterThan(25);
    expect(state.temperature).toBeLessThan(41);
  });

  it('clamps the target to [0, max]', () => {
    const motor = new MotorModel({ clock: frozenClock(), ambientTemperature: () => 25 });
    expect(motor.setTargetSpeed(60)).toBe(45);
    expect(motor.setTargetSpeed(-3)).toBe(0);
  });

  it('honours a custom speed limit', () => {
    const motor = new MotorModel({ clock: frozenClock(), ambientTemperature: () => 25, maxSpeedKph: 25 });
    expect(motor.setTargetSpeed(30)).toBe(25);
  });

  it('draws no power and no torque while stopped', () => {
    const clock = frozenClock();
    const motor = new MotorModel({ clock, ambientTemperature: () => 25 });
    clock.advance(10_000);

    const state = motor.getState();
    expect(state.speed).toBe(0);
    expect(state.power).toBe(0);
    expect(state.torque).toBe(0);
    expect(state.efficiency).toBeCloseTo(0.9, 10);
    expect(state.temperature).toBe(25);
  });

  it('computes expected power from speed', () => {
    expect(expectedPower(0)).toBe(100);
    expect(expectedPower(10)).toBe(200);
    expect(expectedPower(45)).toBe(1337.5);
  });
});

// ─── BatteryModel ─────────────────────────────────────────────────────────────

describe('BatteryModel', () => {
  it('maps level onto a 30–42 V curve', () => {
    expect(voltageAtLevel(0)).toBe(30);
    expect(voltageAtLevel(50)).toBe(36);
    expect(voltageAtLevel(100)).toBe(42);
  });

  it('drains by the energy drawn against the Wh rating', () => {
    const clock = frozenClock();
    const battery = new BatteryModel({
      clock,
      capacity: 360,
      loadPower: () => 360,
      ambientTemperature: () => 25,
    });

    clock.advance(HOUR_MS / 2);
    const state = battery.getState();
    expect(state.level).toBeCloseTo(50, 9);
    expect(state.voltage).toBeCloseTo(36, 9);
    expect(state.current).toBeCloseTo(10, 9);
    expect(state.charging).toBe(false);
    expect(state.capacity).toBe(360);
  });

  it('charges at 25 %/h with a negative current', () => {
    const clock = frozenClock();
    const battery = new BatteryModel({
      clock,
      capacity: 360,
      loadPower: () => 0,
      ambientTemperature: () => 25,
      initialLevel: 50,
    });
    expect(battery.setCharging(true)).toBe(true);

    clock.advance(HOUR_MS);
    const state = battery.getState();
    expect(state.level).toBeCloseTo(75, 9);
    expect(state.voltage).toBeCloseTo(39, 9);
    expect(state.current).toBe(-2);
    expect(state.charging).toBe(true);
  });

  it('never charges past 100 % or drains below 0 %', () => {
    const clock = frozenClock();
    const charging = new BatteryModel({
      clock,
      capacity: 360,
      loadPower: () => 0,
      ambientTemperature: () => 25,
      initialLevel: 90,
    });
    charging.setCharging(true);
    const draining = new BatteryModel({
      clock,
      capacity: 36,
      loadPower: () => 1000,
      ambientTemperature: () => 25,
      initialLevel: 10,
    });

    clock.advance(HOUR_MS);
    expect(charging.getState().level).toBe(100);
    expect(draining.getState().level).toBe(0);
  });
});

// ─── ThermalModel ─────────────────────────────────────────────────────────────

describe('ThermalModel', () => {
  it('settles the controller at ambient plus 0.05 °C per watt', () => {
    const clock = frozenClock();
    const thermal = new ThermalModel({
      clock,
      random: constant(0.5),
      baseAmbient: 25,
      loadPower: () => 400,
    });

    clock.advance(10_000_000);
    const state = thermal.getState();
    expect(state.ambient).toBe(25);
    expect(state.controller).toBeCloseTo(45, 6);
  });

  it('bounds ambient drift to ±3 °C', () => {
    const clock = frozenClock();
    const warming = new ThermalModel({ clock, random: constant(1), baseAmbient: 25, loadPower: () => 0 });
    const cooling = new ThermalModel({ clock, random: constant(0), baseAmbient: 25, loadPower: () => 0 });

    clock.advance(1_000_000);
    expect(warming.getState().ambient).toBe(28);
    expect(cooling.getState().ambient).toBe(22);
  });

  it('starts the controller at ambient', () => {
    const thermal = new ThermalModel({
      clock: frozenClock(),
      random: constant(0.5),
      baseAmbient: 18,
      loadPower: () => 0,
    });
    expect(thermal.getState()).toEqual({ ambient: 18, controller: 18 });
  });
});
