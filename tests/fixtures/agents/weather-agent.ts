import { z } from 'zod';
import { mockable, recordExecutionLog } from '../../../src/mocks/context.js';

const getForecast = mockable(
  'get_forecast',
  async (city: string) => `no data for ${city}`,
  { description: 'Forecast for a city', output: z.string() },
);

export default async function weatherAgent(input: Record<string, unknown> | undefined) {
  const city = typeof input?.city === 'string' ? input.city : 'nowhere';
  recordExecutionLog('info', `forecast requested for ${city}`);
  const forecast = await getForecast(city);
  return { city, forecast, summary: `${city}: ${forecast}` };
}
