import { describe, it, expect } from "vitest";
import { EthernetAdapter } from "../adapter";
import { tap, udpTunnel, type PortBinding } from "../binding";
import { buildCommand } from "../command";

function adapterWith(...bindings: PortBinding[]): EthernetAdapter {
  const adapter = new EthernetAdapter(bindings.length || 1);
  bindings.forEach((binding, portId) => {
    adapter.addBinding(portId, binding).unwrap();
  });
  return adapter;
}

describe("buildCommand", () => {
  it("builds the UDP tunnel command line", () => {
    const command = buildCommand({
      path: "/usr/local/bin/vpcs",
      console: 2000,
      adapters: [adapterWith(udpTunnel(20001, "127.0.0.1", 30001))],
      identity: 5,
    });

    expect(command).toEqual([
      "/usr/local/bin/vpcs",
      "-p", "2000",
      "-s", "20001",
      "-c", "30001",
      "-t", "127.0.0.1",
      "-m", "5",
      "-i", "1",
    ]);
  });

  it("passes -e for TAP without the device name", () => {
    const command = buildCommand({
      path: "vpcs",
      console: 4501,
      adapters: [adapterWith(tap("tap7"))],
      identity: 1,
    });

    expect(command).toEqual(["vpcs", "-p", "4501", "-e", "-m", "1", "-i", "1"]);
  });

  it("omits binding flags for unbound ports", () => {
    const command = buildCommand({
      path: "vpcs",
      console: 4501,
      adapters: [new EthernetAdapter()],
      identity: 9,
    });

    expect(command).toEqual(["vpcs", "-p", "4501", "-m", "9", "-i", "1"]);
  });

  it("places the script file last", () => {
    const command = buildCommand({
      path: "vpcs",
      console: 4501,
      adapters: [adapterWith(udpTunnel(20001, "127.0.0.1", 30001))],
      identity: 2,
      scriptFile: "start.vpc",
    });

    expect(command[command.length - 1]).toBe("start.vpc");
    expect(command.slice(-5)).toEqual(["-m", "2", "-i", "1", "start.vpc"]);
  });

  it("walks adapters, then ports, in order", () => {
    const command = buildCommand({
      path: "vpcs",
      console: 4501,
      adapters: [
        adapterWith(udpTunnel(20001, "10.0.0.1", 30001), tap("tap0")),
        adapterWith(udpTunnel(20002, "10.0.0.2", 30002)),
      ],
      identity: 3,
    });

    expect(command).toEqual([
      "vpcs", "-p", "4501",
      "-s", "20001", "-c", "30001", "-t", "10.0.0.1",
      "-e",
      "-s", "20002", "-c", "30002", "-t", "10.0.0.2",
      "-m", "3", "-i", "1",
    ]);
  });

  it("is deterministic", () => {
    const options = {
      path: "vpcs",
      console: 4501,
      adapters: [adapterWith(udpTunnel(20001, "127.0.0.1", 30001))],
      identity: 4,
      scriptFile: "start.vpc",
    };

    expect(buildCommand(options)).toEqual(buildCommand(options));
  });
});
