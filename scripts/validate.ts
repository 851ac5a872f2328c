/**
 * envwatch Validation Script
 *
 * Smoke-checks a running server end to end:
 * 1. Health and bootstrapped history
 * 2. Statistics ranges
 * 3. Ingest a reading (and an out-of-range one)
 * 4. Anomaly and chart endpoints
 * 5. One live event from the SSE stream
 *
 * Run: npm run validate
 */

const API_BASE = process.env.API_BASE || 'http://localhost:3000';

interface ReadingJson {
  timestamp: string;
  temperature: number;
  humidity: number;
  pressure: number;
  status: string;
}

function log(emoji: string, message: string) {
  console.log(`${emoji}  ${message}`);
}

async function waitForServer(maxAttempts = 30): Promise<boolean> {
  log('⏳', 'Waiting for server to be ready...');

  for (let i = 0; i < maxAttempts; i++) {
    try {
      const response = await fetch(`${API_BASE}/health`);
      if (response.ok) {
        log('✅', 'Server is ready');
        return true;
      }
    } catch {
      // Server not ready yet
    }
    await new Promise((r) => setTimeout(r, 500));
  }

  log('❌', 'Server failed to start');
  return false;
}

function assertEqual<T>(actual: T, expected: T, name: string): boolean {
  if (actual === expected) {
    log('✅', `${name}: ${String(actual)} === ${String(expected)}`);
    return true;
  }
  log('❌', `${name}: expected ${String(expected)}, got ${String(actual)}`);
  return false;
}

function assertBetween(value: number, min: number, max: number, name: string): boolean {
  if (value >= min && value <= max) {
    log('✅', `${name}: ${value.toFixed(2)} in [${min}, ${max}]`);
    return true;
  }
  log('❌', `${name}: ${value} outside [${min}, ${max}]`);
  return false;
}

async function getJson<T>(path: string): Promise<T> {
  const response = await fetch(`${API_BASE}${path}`);
  if (!response.ok) {
    throw new Error(`GET ${path} failed: ${response.status}`);
  }
  return (await response.json()) as T;
}

async function verifyHistory(): Promise<boolean> {
  log('🔍', 'Verifying bootstrapped history...');
  const { readings } = await getJson<{ readings: ReadingJson[] }>('/v1/readings');

  let allPassed = assertEqual(readings.length >= 50, true, 'At least 50 readings in history');

  const ordered = readings.every((r, i) => i === 0 || Date.parse(r.timestamp) > Date.parse(readings[i - 1].timestamp));
  allPassed = assertEqual(ordered, true, 'History is strictly chronological') && allPassed;

  return allPassed;
}

async function verifyStatistics(): Promise<boolean> {
  log('🔍', 'Verifying statistics...');
  const stats = await getJson<{ temp_mean: number; humidity_mean: number; pressure_mean: number }>('/v1/statistics');

  let allPassed = assertBetween(stats.temp_mean, 18, 26, 'temp_mean');
  allPassed = assertBetween(stats.humidity_mean, 30, 65, 'humidity_mean') && allPassed;
  allPassed = assertBetween(stats.pressure_mean, 1000, 1030, 'pressure_mean') && allPassed;

  return allPassed;
}

async function verifyIngest(): Promise<boolean> {
  log('📥', 'Ingesting readings...');

  const ok = await fetch(`${API_BASE}/v1/readings`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ temperature: 21.5, humidity: 45, pressure: 1012, status: 'normal' }),
  });
  const okBody = (await ok.json()) as { quality_flags: unknown[] };

  let allPassed = assertEqual(ok.status, 200, 'In-range reading accepted');
  allPassed = assertEqual(okBody.quality_flags.length, 0, 'In-range reading has no quality flags') && allPassed;

  const flagged = await fetch(`${API_BASE}/v1/readings`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ temperature: 21.5, humidity: 120, pressure: 1012, status: 'warning' }),
  });
  const flaggedBody = (await flagged.json()) as { quality_flags: Array<{ field: string }> };

  allPassed = assertEqual(flagged.status, 200, 'Out-of-range reading accepted') && allPassed;
  allPassed = assertEqual(flaggedBody.quality_flags[0]?.field, 'humidity', 'Humidity flagged') && allPassed;

  const rejected = await fetch(`${API_BASE}/v1/readings`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ temperature: 'hot', humidity: 45, pressure: 1012, status: 'normal' }),
  });
  allPassed = assertEqual(rejected.status, 400, 'Malformed reading rejected') && allPassed;

  return allPassed;
}

async function verifyAnomaliesAndCharts(): Promise<boolean> {
  log('🔍', 'Verifying anomalies and chart data...');

  const anomalies = await getJson<{ field: string; threshold: number }>('/v1/anomalies?field=humidity&threshold=2.5');
  let allPassed = assertEqual(anomalies.field, 'humidity', 'Anomaly field echoed');
  allPassed = assertEqual(anomalies.threshold, 2.5, 'Anomaly threshold echoed') && allPassed;

  const charts = await getJson<{ correlation: { matrix: number[][] }; anomaly_count: number }>('/v1/charts');
  allPassed = assertEqual(charts.correlation.matrix.length, 3, 'Correlation matrix is 3x3') && allPassed;

  return allPassed;
}

async function verifyStream(timeoutMs = 10000): Promise<boolean> {
  log('📡', 'Waiting for one live event...');

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(`${API_BASE}/stream`, { signal: controller.signal });
    if (!response.body) {
      log('❌', 'Stream has no body');
      return false;
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let text = '';

    while (!text.includes('event: sensor_update')) {
      const { value, done } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }

    return assertEqual(text.includes('event: sensor_update'), true, 'Received sensor_update event');
  } catch (err) {
    log('❌', `Stream failed: ${String(err)}`);
    return false;
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
}

async function main() {
  console.log('═'.repeat(60));
  console.log('envwatch validation');
  console.log('═'.repeat(60));

  try {
    if (!(await waitForServer())) {
      process.exit(1);
    }

    let allPassed = true;
    allPassed = (await verifyHistory()) && allPassed;
    allPassed = (await verifyStatistics()) && allPassed;
    allPassed = (await verifyIngest()) && allPassed;
    allPassed = (await verifyAnomaliesAndCharts()) && allPassed;
    allPassed = (await verifyStream()) && allPassed;

    console.log('\n' + '═'.repeat(60));
    if (allPassed) {
      console.log('✅ ALL VALIDATIONS PASSED');
    } else {
      console.log('❌ SOME VALIDATIONS FAILED');
      process.exit(1);
    }
  } catch (error) {
    console.error('\n❌ Validation script error:', error);
    process.exit(1);
  }
}

void main();
