/**
 * Smoke test against a running instance.
 * Run with: npx tsx scripts/smoke.ts [baseUrl]
 */
import 'dotenv/config';

const baseUrl = process.argv[2] ?? `http://localhost:${process.env.PORT || 8080}`;

const CHECKS: Array<{ label: string; path: string }> = [
  { label: 'Health endpoint', path: '/health' },
  { label: 'Weather (New York City)', path: '/weather?lat=40.7128&lon=-74.0060' },
  { label: 'Weather (Los Angeles)', path: '/weather?lat=34.0522&lon=-118.2437' },
  { label: 'Weather (Chicago)', path: '/weather?lat=41.8781&lon=-87.6298' },
  { label: 'Missing parameters', path: '/weather' },
  { label: 'Invalid coordinates', path: '/weather?lat=100&lon=200' },
  { label: 'International coordinates (London)', path: '/weather?lat=51.5074&lon=-0.1278' },
];

async function main(): Promise<void> {
  console.log(`Weather service smoke test against ${baseUrl}\n`);

  for (const [index, check] of CHECKS.entries()) {
    console.log(`${index + 1}. ${check.label}`);
    const response = await fetch(`${baseUrl}${check.path}`);
    const body = await response.text();
    console.log(`   ${response.status} ${body.trim()}\n`);
  }

  console.log('Smoke test completed');
}

main().catch((error) => {
  console.error('Smoke test failed (is the service running?):', error);
  process.exit(1);
});
