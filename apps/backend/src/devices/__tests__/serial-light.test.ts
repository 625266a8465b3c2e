import { describe, it, expect, vi, afterEach } from "vitest";
import { SerialPortMock } from "serialport";
import { DeviceUnavailableError } from "../../errors";
import { SerialLightAdapter } from "../providers/serial-light";

vi.mock("serialport", async (importOriginal) => {
  const actual = await importOriginal<typeof import("serialport")>();
  return { ...actual, SerialPort: actual.SerialPortMock };
});

describe("SerialLightAdapter", () => {
  afterEach(() => {
    SerialPortMock.binding.reset();
  });

  it("opens, writes and closes a port", async () => {
    SerialPortMock.binding.createPort("COM2");
    const light = new SerialLightAdapter("COM2");

    await light.open();
    expect(light.isOpen()).toBe(true);

    await expect(light.writeBrightness(120)).resolves.toBeUndefined();

    await light.close();
    expect(light.isOpen()).toBe(false);
  });

  it("fails to open a port that does not exist", async () => {
    const light = new SerialLightAdapter("COM9");

    await expect(light.open()).rejects.toThrow();
    expect(light.isOpen()).toBe(false);
  });

  it("refuses to write while closed", async () => {
    const light = new SerialLightAdapter("COM8");

    await expect(light.writeBrightness(10)).rejects.toBeInstanceOf(
      DeviceUnavailableError,
    );
  });
});
