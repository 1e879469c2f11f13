import { z } from 'zod';
import type { WeatherClient } from '../weather/client';
import { defineTool } from './registry';

const coordinates = z
  .object({
    latitude: z.number(),
    longitude: z.number()
  })
  .strict();

export function getWeatherTool(client: WeatherClient) {
  return defineTool({
    name: 'get_weather',
    description: 'Get current temperature for provided coordinates in celsius.',
    parameters: coordinates,
    jsonSchema: {
      type: 'object',
      properties: {
        latitude: { type: 'number' },
        longitude: { type: 'number' }
      },
      required: ['latitude', 'longitude'],
      additionalProperties: false
    },
    strict: true,
    handler: ({ latitude, longitude }) => client.currentTemperature(latitude, longitude)
  });
}
