/**
 * Light controller wire protocol
 *
 * Frame: STX 'A' vvv ',' vvv ',' vvv ',' vvv ETX
 * where vvv is the brightness as three ASCII digits, repeated for the four
 * output channels of the controller.
 */

import { BRIGHTNESS } from "@visionrig/config";
import { padNumber } from "@visionrig/utils";

const STX = 0x02;
const ETX = 0x03;
const COMMAND_SET_ALL = "A";
const CHANNEL_COUNT = 4;

/**
 * Clamp to the controller's range. NaN becomes 0; infinities clamp like any
 * other out-of-range value.
 */
export function clampBrightness(value: number): number {
  if (Number.isNaN(value)) {
    return BRIGHTNESS.MIN;
  }
  const rounded = Math.round(value);
  return Math.min(BRIGHTNESS.MAX, Math.max(BRIGHTNESS.MIN, rounded));
}

export function encodeBrightnessPacket(value: number): Buffer {
  const digits = padNumber(clampBrightness(value), 3);
  const body = Array.from({ length: CHANNEL_COUNT }, () => digits).join(",");
  return Buffer.concat([
    Buffer.from([STX]),
    Buffer.from(COMMAND_SET_ALL + body, "ascii"),
    Buffer.from([ETX]),
  ]);
}
