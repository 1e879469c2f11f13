import { DEFAULT_WEATHER_API_URL } from '../src/config';
import { WeatherClient } from '../src/weather/client';

// Usage: tsx scripts/weather.diagnose.ts <latitude> <longitude>
async function main() {
  const [latArg = '48.8566', lonArg = '2.3522'] = process.argv.slice(2);
  const latitude = Number(latArg);
  const longitude = Number(lonArg);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    throw new Error(`expected numeric coordinates, got "${latArg}" "${lonArg}"`);
  }

  const client = new WeatherClient(process.env.WEATHER_API_URL ?? DEFAULT_WEATHER_API_URL);
  console.log('request:', client.forecastUrl(latitude, longitude));
  const started = Date.now();
  const temperature = await client.currentTemperature(latitude, longitude);
  console.log('temperature_2m:', temperature);
  console.log('elapsed ms:', Date.now() - started);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
