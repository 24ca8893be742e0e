import { describe, it, expect } from 'vitest';
import { classifyTemperature, toFahrenheit } from '../../core/weather/temperatureClassifier.js';

describe('classifyTemperature', () => {
  it('puts the boundaries in the right buckets', () => {
    expect(classifyTemperature(40)).toBe('cold');
    expect(classifyTemperature(41)).toBe('moderate');
    expect(classifyTemperature(79)).toBe('moderate');
    expect(classifyTemperature(80)).toBe('hot');
  });

  it('maps every integer in a wide range to exactly one bucket', () => {
    for (let t = -60; t <= 130; t++) {
      const expected = t >= 80 ? 'hot' : t <= 40 ? 'cold' : 'moderate';
      expect(classifyTemperature(t)).toBe(expected);
    }
  });
});

describe('toFahrenheit', () => {
  it('converts Celsius', () => {
    expect(toFahrenheit(0, 'C')).toBe(32);
    expect(toFahrenheit(100, 'C')).toBe(212);
    expect(toFahrenheit(-40, 'C')).toBe(-40);
  });

  it('matches the Celsius unit case-insensitively', () => {
    expect(toFahrenheit(100, 'c')).toBe(212);
  });

  it('truncates toward zero', () => {
    expect(toFahrenheit(21, 'C')).toBe(69);
    expect(toFahrenheit(-1, 'C')).toBe(30);
    expect(toFahrenheit(-19, 'C')).toBe(-2);
  });

  it('passes Fahrenheit through unchanged', () => {
    expect(toFahrenheit(70, 'F')).toBe(70);
  });

  it('treats unrecognised units as Fahrenheit', () => {
    expect(toFahrenheit(300, 'K')).toBe(300);
    expect(toFahrenheit(55, '')).toBe(55);
  });
});
