import assert from 'node:assert/strict';
import test from 'node:test';

import { modelToJson } from '../lib/pinctrl/model_json.js';
import { addLocation, createModel, ensurePeripheral, ensureSignal } from '../lib/pinctrl/types.js';

test('modelToJson lists peripherals in model order with sorted pinouts', () => {
  const model = createModel();
  const timer = ensurePeripheral(model, 'TIMER0', 8);
  const cc0 = ensureSignal(timer, 'CC0');
  cc0.enableBit = 0;
  cc0.routeOffset = 1;
  addLocation(cc0.pinout, 3, 1);
  addLocation(cc0.pinout, 0, 9);
  addLocation(cc0.pinout, 0, 4);
  ensureSignal(ensurePeripheral(model, 'PTI', 16), 'CDTI0').enableBit = 2;

  assert.deepEqual(modelToJson('xg24', ['efr32mg24', 'bgm24'], model), {
    family: 'xg24',
    variants: ['efr32mg24', 'bgm24'],
    peripherals: [
      {
        name: 'TIMER0',
        base: 8,
        signals: [
          {
            name: 'CC0',
            enableBit: 0,
            routeOffset: 1,
            pinout: [
              { port: 0, pins: [4, 9] },
              { port: 3, pins: [1] }
            ]
          }
        ]
      },
      {
        name: 'PTI',
        base: 16,
        signals: [{ name: 'CDTI0', enableBit: 2, routeOffset: null, pinout: [] }]
      }
    ]
  });
});
