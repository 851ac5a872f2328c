import { describe, it, expect } from 'vitest';
import {
  buildAnomalyHighlights,
  buildChartData,
  buildCorrelationMatrix,
  buildStatusDistribution,
  buildTimeSeries,
} from '../utils/charts';
import { makeReading } from './helpers';

const T0 = Date.parse('2024-05-01T08:00:00.000Z');

const snapshot = [
  makeReading({ timestamp: T0, temperature: 20, humidity: 40, pressure: 1010, status: 'normal' }),
  makeReading({ timestamp: T0 + 3000, temperature: 21, humidity: 42, pressure: 1010, status: 'warning' }),
  makeReading({ timestamp: T0 + 6000, temperature: 22, humidity: 44, pressure: 1010, status: 'normal' }),
  makeReading({ timestamp: T0 + 9000, temperature: 23, humidity: 46, pressure: 1010, status: 'critical' }),
];

describe('chart data', () => {
  it('builds column arrays with ISO timestamps', () => {
    expect(buildTimeSeries(snapshot)).toEqual({
      timestamps: [
        '2024-05-01T08:00:00.000Z',
        '2024-05-01T08:00:03.000Z',
        '2024-05-01T08:00:06.000Z',
        '2024-05-01T08:00:09.000Z',
      ],
      temperature: [20, 21, 22, 23],
      humidity: [40, 42, 44, 46],
      pressure: [1010, 1010, 1010, 1010],
    });
  });

  it('builds a status distribution with the dashboard colors', () => {
    expect(buildStatusDistribution(snapshot)).toEqual({
      labels: ['critical', 'normal', 'warning'],
      values: [1, 2, 1],
      colors: ['#EF4444', '#10B981', '#F59E0B'],
    });
  });

  it('builds a correlation matrix with 1 on the diagonal and 0 for constant fields', () => {
    const { fields, matrix } = buildCorrelationMatrix(snapshot);

    expect(fields).toEqual(['temperature', 'humidity', 'pressure']);
    expect(matrix).toHaveLength(3);
    expect(matrix[0][0]).toBe(1);
    expect(matrix[1][1]).toBe(1);
    expect(matrix[2][2]).toBe(1);
    expect(matrix[0][1]).toBeCloseTo(1, 10);
    expect(matrix[1][0]).toBeCloseTo(1, 10);
    expect(matrix[0][2]).toBe(0);
    expect(matrix[2][1]).toBe(0);
  });

  it('leaves the correlation matrix empty with fewer than two readings', () => {
    expect(buildCorrelationMatrix(snapshot.slice(0, 1)).matrix).toEqual([]);
  });

  it('highlights anomalies for the chosen field', () => {
    const highlights = buildAnomalyHighlights([{ timestamp: T0, field: 'humidity', value: 99, zScore: 3.1 }], 'humidity');

    expect(highlights).toEqual({
      field: 'humidity',
      timestamps: ['2024-05-01T08:00:00.000Z'],
      values: [99],
    });
  });

  it('returns empty datasets for an empty snapshot', () => {
    const data = buildChartData([], []);

    expect(data).toEqual({
      timeseries: { timestamps: [], temperature: [], humidity: [], pressure: [] },
      status: { labels: [], values: [], colors: [] },
      correlation: { fields: ['temperature', 'humidity', 'pressure'], matrix: [] },
      anomalies: { field: 'temperature', timestamps: [], values: [] },
    });
  });
});
