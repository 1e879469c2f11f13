import test from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { ToolArgumentsError, UnknownToolError } from '../src/errors';
import { ToolExecutor, stringifyResult } from '../src/tools/executor';
import { ToolRegistry, defineTool } from '../src/tools/registry';
import { getWeatherTool } from '../src/tools/weather';
import { WeatherClient } from '../src/weather/client';
import { forecast, stubFetch } from './fakes';

function weatherExecutor(temperature = 24.9) {
  const stub = stubFetch(forecast(temperature));
  const registry = new ToolRegistry();
  registry.register(getWeatherTool(new WeatherClient('https://weather.test/v1/forecast', stub.fetch)));
  return { executor: new ToolExecutor(registry), registry, calls: stub.calls };
}

test('get_weather schema requires numeric coordinates and nothing else', () => {
  const { registry } = weatherExecutor();
  assert.deepEqual(registry.schemas(), [
    {
      type: 'function',
      function: {
        name: 'get_weather',
        description: 'Get current temperature for provided coordinates in celsius.',
        parameters: {
          type: 'object',
          properties: {
            latitude: { type: 'number' },
            longitude: { type: 'number' }
          },
          required: ['latitude', 'longitude'],
          additionalProperties: false
        },
        strict: true
      }
    }
  ]);
});

test('registry rejects a second tool with the same name', () => {
  const { registry } = weatherExecutor();
  const again = defineTool({
    name: 'get_weather',
    description: 'duplicate',
    parameters: z.object({}),
    jsonSchema: { type: 'object', properties: {} },
    handler: async () => 0
  });
  assert.throws(() => registry.register(again), /tool already registered: get_weather/);
  assert.deepEqual(registry.names(), ['get_weather']);
});

test('executor dispatches by name and stringifies the reading', async () => {
  const { executor, calls } = weatherExecutor(24.9);
  const result = await executor.execute({
    id: 'call_1',
    name: 'get_weather',
    arguments: '{"latitude":48.8566,"longitude":2.3522}'
  });
  assert.deepEqual(result, { toolCallId: 'call_1', content: '24.9' });
  assert.equal(calls.length, 1);
});

test('executor rejects unknown tools', async () => {
  const { executor } = weatherExecutor();
  await assert.rejects(executor.execute({ id: 'call_1', name: 'get_time', arguments: '{}' }), UnknownToolError);
});

test('malformed or invalid arguments fail before any request', async () => {
  const { executor, calls } = weatherExecutor();
  const bad = [
    '{"latitude":48.8566,',
    '{"latitude":48.8566}',
    '{"latitude":"48.8566","longitude":2.3522}',
    '{"latitude":48.8566,"longitude":2.3522,"units":"F"}'
  ];
  for (const args of bad) {
    await assert.rejects(executor.execute({ id: 'call_1', name: 'get_weather', arguments: args }), ToolArgumentsError);
  }
  assert.equal(calls.length, 0);
});

test('results are stringified for the tool message', () => {
  assert.equal(stringifyResult('sunny'), 'sunny');
  assert.equal(stringifyResult(24.9), '24.9');
  assert.equal(stringifyResult({ temperature: -3.5 }), '{"temperature":-3.5}');
  assert.equal(stringifyResult(undefined), 'undefined');
});
