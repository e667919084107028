/**
 * LED pixel display commands
 * All frames follow format: [length lo, length hi, ...command bytes, ...payload]
 * where length counts the whole frame including the two length bytes.
 */
import {
  boolParam,
  calendarDate,
  colorParam,
  dateParam,
  defineCommand,
  intParam,
  type PixelCommand,
  unsupportedCommand
} from './command-params.js';

export function frame(...body: number[]): Uint8Array {
  const length = body.length + 2;
  return new Uint8Array([length & 0xff, (length >> 8) & 0xff, ...body]);
}

export const clear = defineCommand({
  name: 'clear',
  description: 'Clear the display',
  params: {},
  encode: () => frame(0x03, 0x80)
});

export const setBrightness = defineCommand({
  name: 'set_brightness',
  description: 'Set brightness in percent',
  params: { value: intParam(0, 100) },
  encode: ({ value }) => frame(0x04, 0x80, value)
});

export const setOrientation = defineCommand({
  name: 'set_orientation',
  description: 'Rotate the display by 90 degree steps',
  params: { orientation: intParam(0, 3).default('0') },
  encode: ({ orientation }) => frame(0x06, 0x80, orientation)
});

export const setSpeed = defineCommand({
  name: 'set_speed',
  description: 'Set scrolling/animation speed in percent',
  params: { speed: intParam(0, 100) },
  encode: ({ speed }) => frame(0x08, 0x80, speed)
});

export const setFunMode = defineCommand({
  name: 'set_fun_mode',
  description: 'Enable or disable DIY (free drawing) mode',
  params: { enable: boolParam().default('false') },
  encode: ({ enable }) => frame(0x04, 0x01, enable ? 0x01 : 0x00)
});

export const setPower = defineCommand({
  name: 'set_power',
  description: 'Switch the display on or off',
  params: { on: boolParam().default('true') },
  encode: ({ on }) => frame(0x07, 0x01, on ? 0x01 : 0x00)
});

export const setPixel = defineCommand({
  name: 'set_pixel',
  description: 'Light one pixel (fun mode must be enabled)',
  params: {
    x: intParam(0, 255),
    y: intParam(0, 255),
    color: colorParam()
  },
  encode: ({ x, y, color }) => frame(0x05, 0x01, 0x00, ...color, x, y)
});

export const setClockMode = defineCommand({
  name: 'set_clock_mode',
  description: 'Show the clock in one of the built-in styles',
  params: {
    style: intParam(0, 8).default('1'),
    date: dateParam().optional(),
    show_date: boolParam().default('true'),
    format_24: boolParam().default('true')
  },
  encode: ({ style, date, show_date, format_24 }) => {
    const { day, month, year, weekday } = date ?? calendarDate(new Date());
    return frame(
      0x06, 0x01,
      style,
      format_24 ? 0x01 : 0x00,
      show_date ? 0x01 : 0x00,
      year % 100, month, day, weekday
    );
  }
});

export const setScreen = defineCommand({
  name: 'set_screen',
  description: 'Show a saved screen slot',
  params: { screen: intParam(1, 9) },
  encode: ({ screen }) => frame(0x07, 0x01, 0x01, 0x00, screen)
});

export const deleteScreen = defineCommand({
  name: 'delete_screen',
  description: 'Delete a saved screen slot',
  params: { screen: intParam(1, 10) },
  encode: ({ screen }) => frame(0x02, 0x01, 0x01, 0x00, screen)
});

export const sendText = unsupportedCommand('send_text', 'Scroll a text message', 'text rendering needs a bitmap font');

export const sendAnimation = unsupportedCommand('send_animation', 'Upload a GIF animation', 'animation upload needs an image codec');

export const PIXEL_COMMANDS: readonly PixelCommand[] = [
  clear,
  setBrightness,
  setClockMode,
  setFunMode,
  setPixel,
  deleteScreen,
  sendText,
  setScreen,
  setSpeed,
  sendAnimation,
  setOrientation,
  setPower
];
