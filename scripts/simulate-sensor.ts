/**
 * Simulate a Hardware Sensor Adapter
 *
 * Posts readings to a running server the way a real sensor bridge would:
 * - a slow temperature drift with small noise
 * - an occasional spike, to exercise anomaly detection
 * - an occasional out-of-range value, to exercise quality flags
 *
 * Run: npm run simulate:sensor -- [count] [interval_ms]
 */

const API_BASE = process.env.API_BASE || 'http://localhost:3000';

const COUNT = parseInt(process.argv[2] || '40', 10);
const INTERVAL_MS = parseInt(process.argv[3] || '500', 10);

// Chance per reading
const SPIKE_PROBABILITY = 0.05;
const OUT_OF_RANGE_PROBABILITY = 0.03;

const STATUSES = ['normal', 'warning', 'critical'] as const;

interface IngestResponse {
  reading: { timestamp: string; temperature: number; status: string };
  quality_flags: Array<{ field: string; value: number; min: number; max: number }>;
}

function log(emoji: string, message: string) {
  console.log(`${emoji}  ${message}`);
}

function noise(amplitude: number): number {
  return (Math.random() * 2 - 1) * amplitude;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function buildReading(step: number) {
  // Slow sine drift around 22 °C
  let temperature = 22 + 2 * Math.sin(step / 10) + noise(0.3);
  let humidity = 47 + noise(5);
  const pressure = 1015 + noise(8);

  if (Math.random() < SPIKE_PROBABILITY) {
    temperature += 12;
  }
  if (Math.random() < OUT_OF_RANGE_PROBABILITY) {
    humidity = 104 + noise(2);
  }

  return {
    timestamp: new Date().toISOString(),
    temperature: round1(temperature),
    humidity: round1(humidity),
    pressure: round1(pressure),
    status: STATUSES[Math.floor(Math.random() * STATUSES.length)],
  };
}

async function main() {
  log('📡', `Posting ${COUNT} readings to ${API_BASE} every ${INTERVAL_MS}ms`);

  let flagged = 0;

  for (let step = 0; step < COUNT; step++) {
    const reading = buildReading(step);

    const response = await fetch(`${API_BASE}/v1/readings`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(reading),
    });

    if (!response.ok) {
      log('❌', `Reading ${step} rejected: ${response.status} ${await response.text()}`);
      continue;
    }

    const result = (await response.json()) as IngestResponse;
    if (result.quality_flags.length > 0) {
      flagged++;
      const fields = result.quality_flags.map((f) => `${f.field}=${f.value}`).join(', ');
      log('⚠️', `Reading ${step} accepted with quality flags: ${fields}`);
    } else {
      log('✅', `Reading ${step}: ${result.reading.temperature}°C (${result.reading.status})`);
    }

    await new Promise((r) => setTimeout(r, INTERVAL_MS));
  }

  const anomalies = await fetch(`${API_BASE}/v1/anomalies`);
  const body = (await anomalies.json()) as { anomalies: unknown[] };

  log('📊', `Done. ${flagged} readings flagged, ${body.anomalies.length} temperature anomalies in window`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
