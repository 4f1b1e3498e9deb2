import { RequestInit, Response } from "undici";
import { describe, expect, it } from "vitest";
import { defaultConfig } from "../src/config/defaults";
import {
  ActionExecutionError,
  AgentError,
  ConnectionError,
  ProcessLaunchError,
} from "../src/errors";
import { AgentClient, FetchFn, toWireAction } from "../src/rpc/agentClient";
import { metadata } from "./fakes";

interface Call {
  url: string;
  init: RequestInit;
}

function stubFetch(respond: (url: string) => Response | Promise<Response>) {
  const calls: Call[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url, init });
    return respond(url);
  };
  return { fetchFn, calls };
}

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

const bodyOf = (call: Call | undefined): unknown =>
  typeof call?.init.body === "string" ? JSON.parse(call.init.body) : undefined;

function client(fetchFn: FetchFn): AgentClient {
  return new AgentClient({ host: "10.0.0.9", port: 8080 }, defaultConfig.agent, fetchFn);
}

describe("AgentClient", () => {
  it("downloads the screenshot bytes", async () => {
    const { fetchFn, calls } = stubFetch(() => new Response(Buffer.from("png-bytes")));

    const image = await client(fetchFn).captureScreenshot();

    expect(image.toString()).toBe("png-bytes");
    expect(calls[0]?.url).toBe("http://10.0.0.9:8080/screenshot");
    expect(calls[0]?.init.method).toBe("GET");
  });

  it("posts actions in the agent's wire format", async () => {
    const { fetchFn, calls } = stubFetch(() => json({ status: "success" }));

    const ack = await client(fetchFn).sendAction(
      { type: "click", button: "left", moveDuration: 0.3, clickDelay: 0.1 },
      { x: 640, y: 360 },
    );

    expect(ack.status).toBe("success");
    expect(calls[0]?.url).toBe("http://10.0.0.9:8080/action");
    expect(bodyOf(calls[0])).toEqual({
      type: "click",
      x: 640,
      y: 360,
      button: "left",
      move_duration: 0.3,
      click_delay: 0.1,
    });
  });

  it("turns a rejected action into an ActionExecutionError", async () => {
    const { fetchFn } = stubFetch(() => json({ error: "no window" }, 500));

    await expect(client(fetchFn).sendAction({ type: "key", key: "enter" })).rejects.toThrow(
      new ActionExecutionError("Agent rejected key: no window"),
    );
  });

  it("treats an error acknowledgement as a failed action", async () => {
    const { fetchFn } = stubFetch(() => json({ status: "error", error: "unknown key" }));

    const failure = client(fetchFn).sendAction({ type: "key", key: "f13" });

    await expect(failure).rejects.toBeInstanceOf(ActionExecutionError);
    await expect(failure).rejects.toThrow("Agent failed key: unknown key");
  });

  it("reports an unreachable agent as a ConnectionError", async () => {
    const fetchFn: FetchFn = async () => {
      throw new TypeError("fetch failed");
    };

    const failure = client(fetchFn).captureScreenshot();

    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toThrow("/screenshot unreachable at http://10.0.0.9:8080: fetch failed");
  });

  it("reports a timed out request as a ConnectionError", async () => {
    const fetchFn: FetchFn = async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    };

    await expect(client(fetchFn).healthCheck()).rejects.toThrow(
      new ConnectionError("/health timed out after 5000ms (http://10.0.0.9:8080)"),
    );
  });

  it("reads health from the response body", async () => {
    await expect(client(stubFetch(() => json({ status: "ok" })).fetchFn).healthCheck()).resolves.toBe(true);
    await expect(client(stubFetch(() => json({ ok: true })).fetchFn).healthCheck()).resolves.toBe(true);
    await expect(client(stubFetch(() => json({ status: "degraded" })).fetchFn).healthCheck()).resolves.toBe(false);
    await expect(client(stubFetch(() => json({}, 503)).fetchFn).healthCheck()).resolves.toBe(false);
  });

  it("launches a game with its marker and startup wait in seconds", async () => {
    const { fetchFn, calls } = stubFetch(() =>
      json({
        status: "success",
        game_process_pid: 77,
        game_process_name: "racer.exe",
        foreground_confirmed: true,
      }),
    );

    const launched = await client(fetchFn).launchProcess(
      metadata({ name: "Racer", path: "C:\\Games\\racer.exe", processMarker: "racer", startupWaitMs: 30_000 }),
    );

    expect(launched).toEqual({ pid: 77, processName: "racer.exe", foreground: true, warning: undefined });
    expect(bodyOf(calls[0])).toEqual({
      path: "C:\\Games\\racer.exe",
      args: [],
      process_marker: "racer",
      startup_wait: 30,
    });
  });

  it("wraps launch failures in ProcessLaunchError", async () => {
    const { fetchFn } = stubFetch(() => json({ error: "path not found" }, 500));

    await expect(
      client(fetchFn).launchProcess(metadata({ name: "Racer", path: "C:\\Games\\racer.exe" })),
    ).rejects.toThrow(new ProcessLaunchError("Launch of Racer failed: Agent responded 500: path not found"));
    await expect(client(fetchFn).launchProcess(metadata({ name: "Racer" }))).rejects.toThrow(
      "Game Racer has no launch path",
    );
  });

  it("passes the process marker as a query parameter", async () => {
    const { fetchFn, calls } = stubFetch(() => json({ running: true }));

    const status = await client(fetchFn).queryProcessStatus("racer");

    expect(status).toEqual({ running: true, foregrounded: false });
    expect(calls[0]?.url).toBe("http://10.0.0.9:8080/process/status?marker=racer");
  });

  it("returns false when there is no process to kill", async () => {
    const response = json({ error: "not running" }, 404);
    const { fetchFn } = stubFetch(() => response);

    await expect(client(fetchFn).killProcess("racer")).resolves.toBe(false);
    expect(response.bodyUsed).toBe(true);
  });

  it("releases the body of an unhealthy answer", async () => {
    const response = json({ error: "starting" }, 503);
    const { fetchFn } = stubFetch(() => response);

    await expect(client(fetchFn).healthCheck()).resolves.toBe(false);
    expect(response.bodyUsed).toBe(true);
  });

  it("treats a health answer that is not JSON as unhealthy", async () => {
    const { fetchFn } = stubFetch(() => new Response("OK", { status: 200 }));

    await expect(client(fetchFn).healthCheck()).resolves.toBe(false);
  });

  it("rejects a malformed status body", async () => {
    const { fetchFn } = stubFetch(() => json({ version: 5 }));

    await expect(client(fetchFn).getStatus()).rejects.toBeInstanceOf(AgentError);
  });

  it("reports a body that is not JSON as an AgentError", async () => {
    const { fetchFn } = stubFetch(() => new Response("<html>gateway</html>", { status: 200 }));

    const failure = client(fetchFn).getStatus();

    await expect(failure).rejects.toBeInstanceOf(AgentError);
    await expect(failure).rejects.toThrow(/^Agent responded 200: Malformed \/status response: /);
  });
});

describe("toWireAction", () => {
  it("sends durations in seconds", () => {
    expect(toWireAction({ type: "wait", durationMs: 1_500 })).toEqual({ type: "wait", duration: 1.5 });
  });

  it("prefers explicit coordinates over the matched element", () => {
    expect(toWireAction({ type: "double_click", button: "right", x: 5, y: 6 }, { x: 100, y: 100 })).toEqual({
      type: "double_click",
      x: 5,
      y: 6,
      button: "right",
    });
  });

  it("uses the custom action name as the wire type", () => {
    expect(toWireAction({ type: "custom", name: "drag", params: { to_x: 10, type: "ignored" } })).toEqual({
      to_x: 10,
      type: "drag",
    });
  });
});
