import fs from "fs";
import type { Server } from "http";
import os from "os";
import path from "path";
import { getExpectedTwilioSignature } from "twilio";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "./app";
import type { AppConfig } from "./config/env";
import { buildReplyText } from "./consentTwilio/domain/replyFormatting";
import { SqliteConsentStore } from "./consentTwilio/stores/sqliteConsentStore";
import type { ConsentBackend } from "./consentTwilio/types";
import { BackgroundTaskRunner } from "./utils/backgroundTasks";

const AUTH_TOKEN = "test-secret";

function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    twilioAuthToken: "",
    programName: "Test Kitchen",
    backgroundConcurrency: 2,
    store: { kind: "sqlite", dbPath: ":unused:" },
    ...overrides,
  };
}

/** Backend whose every write fails, like an unreachable store. */
class FailingBackend implements ConsentBackend {
  writes = 0;
  private fail(): Promise<void> {
    this.writes += 1;
    return Promise.reject(new Error("store unavailable"));
  }
  recordUnsubscribe(): Promise<void> {
    return this.fail();
  }
  recordResubscribe(): Promise<void> {
    return this.fail();
  }
  logInbound(): Promise<void> {
    return this.fail();
  }
  recordDeliveryStatus(): Promise<void> {
    return this.fail();
  }
  async findCustomer() {
    return null;
  }
  async findMessages() {
    return [];
  }
}

describe("webhook app", () => {
  let dir: string;
  let store: SqliteConsentStore;
  let tasks: BackgroundTaskRunner;
  let server: Server | undefined;
  let baseUrl: string;

  async function start(config: AppConfig, backend: ConsentBackend = store): Promise<void> {
    const app = createApp({ config, store: backend, tasks });
    await new Promise<void>((resolve) => {
      server = app.listen(0, "127.0.0.1", () => resolve());
    });
    const address = server?.address();
    if (!address || typeof address === "string") throw new Error("server did not bind");
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function post(route: string, params: Record<string, string>, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}${route}`, { method: "POST", body: new URLSearchParams(params), headers });
  }

  function signedPost(route: string, params: Record<string, string>) {
    const signature = getExpectedTwilioSignature(AUTH_TOKEN, `${baseUrl}${route}`, params);
    return post(route, params, { "X-Twilio-Signature": signature });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "consent-app-"));
    store = new SqliteConsentStore(path.join(dir, "consent.db"));
    store.initialize();
    tasks = new BackgroundTaskRunner(2);
  });

  afterEach(async () => {
    await tasks.onIdle();
    if (server) {
      const s = server;
      s.closeAllConnections();
      await new Promise<void>((resolve) => s.close(() => resolve()));
      server = undefined;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("health", () => {
    it("reports status, service and time", async () => {
      await start(testConfig());

      const res = await fetch(`${baseUrl}/`);
      const body: unknown = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ status: "ok", service: "whatsapp-consent-webhook" });
      expect(body).toHaveProperty("time");
    });

    it("answers 404 for unknown routes", async () => {
      await start(testConfig());

      const res = await fetch(`${baseUrl}/nope`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not found" });
    });
  });

  describe("POST /twilio/inbound", () => {
    it("replies to STOP and records the opt-out", async () => {
      await start(testConfig());

      const res = await post("/twilio/inbound", {
        From: "whatsapp:+50760000000",
        Body: "STOP",
        MessageSid: "SM100",
      });
      const xml = await res.text();

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toMatch(/^text\/xml/);
      expect(xml).toContain(`<Message>${buildReplyText("unsubscribe", "Test Kitchen")}</Message>`);

      await tasks.onIdle();
      const customer = await store.findCustomer("+50760000000");
      expect(customer?.dnc).toBe(true);
      expect(customer?.phone).toBe("+50760000000");
      const [logged] = await store.findMessages("SM100");
      expect(logged).toMatchObject({ phone: "+50760000000", type: "inbound", message: "STOP", status: "received" });
    });

    it("resubscribes on a lower-case keyword", async () => {
      await start(testConfig());

      const res = await post("/twilio/inbound", { From: "whatsapp:+50760000000", Body: " start ", MessageSid: "SM101" });

      expect(await res.text()).toContain(`<Message>${buildReplyText("resubscribe", "Test Kitchen")}</Message>`);
      await tasks.onIdle();
      const customer = await store.findCustomer("+50760000000");
      expect(customer?.dnc).toBe(false);
      expect(customer?.optinSource).toBe("Resubscribe");
    });

    it("answers other messages without touching consent", async () => {
      await start(testConfig());

      const res = await post("/twilio/inbound", { From: "whatsapp:+50760000000", Body: "Hola", MessageSid: "SM102" });

      expect(await res.text()).toContain("<Message>Thanks for contacting Test Kitchen!</Message>");
      await tasks.onIdle();
      expect(await store.findCustomer("+50760000000")).toBeNull();
      expect(await store.findMessages("SM102")).toHaveLength(1);
    });

    it("returns an empty response when there is no sender", async () => {
      await start(testConfig());

      const res = await post("/twilio/inbound", { Body: "STOP", MessageSid: "SM103" });
      const xml = await res.text();

      expect(res.status).toBe(200);
      expect(xml).not.toContain("<Message>");
      await tasks.onIdle();
      expect(await store.findMessages("SM103")).toEqual([]);
    });

    it("replies before the background write finishes", async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      let written = false;
      const slowBackend: ConsentBackend = {
        findCustomer: async () => null,
        findMessages: async () => [],
        logInbound: async () => undefined,
        recordResubscribe: async () => undefined,
        recordDeliveryStatus: async () => undefined,
        recordUnsubscribe: async () => {
          await gate;
          written = true;
        },
      };
      await start(testConfig(), slowBackend);

      const res = await post("/twilio/inbound", { From: "whatsapp:+50760000000", Body: "STOP", MessageSid: "SM104" });

      expect(res.status).toBe(200);
      expect(written).toBe(false);
      release();
      await tasks.onIdle();
      expect(written).toBe(true);
    });

    it("still replies when the store fails", async () => {
      const failing = new FailingBackend();
      await start(testConfig(), failing);

      const res = await post("/twilio/inbound", { From: "whatsapp:+50760000000", Body: "STOP", MessageSid: "SM105" });

      expect(res.status).toBe(200);
      expect(await res.text()).toContain(`<Message>${buildReplyText("unsubscribe", "Test Kitchen")}</Message>`);
      await tasks.onIdle();
      expect(failing.writes).toBe(2);
    });
  });

  describe("POST /twilio/status", () => {
    it("answers OK and records the delivery status", async () => {
      await start(testConfig());

      const res = await post("/twilio/status", { MessageSid: "SM123", MessageStatus: "delivered", To: "whatsapp:+50760000000" });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe("OK");
      await tasks.onIdle();
      expect(await store.findMessages("SM123")).toEqual([
        expect.objectContaining({ sid: "SM123", status: "delivered", error: "", phone: "+50760000000", type: "status-update" }),
      ]);
    });

    it("falls back to SmsSid and joins error code and message", async () => {
      await start(testConfig());

      await post("/twilio/status", {
        SmsSid: "SM124",
        MessageStatus: "undelivered",
        ErrorCode: "63016",
        ErrorMessage: "Outside the allowed window",
      });

      await tasks.onIdle();
      const [row] = await store.findMessages("SM124");
      expect(row.status).toBe("undelivered");
      expect(row.error).toBe("63016 - Outside the allowed window");
    });

    it("answers OK even when the store fails", async () => {
      await start(testConfig(), new FailingBackend());

      const res = await post("/twilio/status", { MessageSid: "SM125", MessageStatus: "failed", ErrorCode: "30007" });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe("OK");
    });
  });

  describe("signature validation", () => {
    it("accepts correctly signed requests", async () => {
      await start(testConfig({ twilioAuthToken: AUTH_TOKEN }));

      const res = await signedPost("/twilio/inbound", { From: "whatsapp:+50760000000", Body: "STOP", MessageSid: "SM200" });

      expect(res.status).toBe(200);
      await tasks.onIdle();
      expect((await store.findCustomer("+50760000000"))?.dnc).toBe(true);
    });

    it("rejects a bad signature on inbound without touching the store", async () => {
      await start(testConfig({ twilioAuthToken: AUTH_TOKEN }));

      const res = await post(
        "/twilio/inbound",
        { From: "whatsapp:+50760000000", Body: "STOP", MessageSid: "SM201" },
        { "X-Twilio-Signature": "AAAAAAAAAAAAAAAAAAAAAAAAAAA=" }
      );

      expect(res.status).toBe(403);
      await tasks.onIdle();
      expect(await store.findCustomer("+50760000000")).toBeNull();
      expect(await store.findMessages("SM201")).toEqual([]);
    });

    it("rejects an unsigned status callback", async () => {
      await start(testConfig({ twilioAuthToken: AUTH_TOKEN }));

      const res = await post("/twilio/status", { MessageSid: "SM202", MessageStatus: "delivered" });

      expect(res.status).toBe(403);
      await tasks.onIdle();
      expect(await store.findMessages("SM202")).toEqual([]);
    });

    it("checks against the public base URL when one is configured", async () => {
      await start(testConfig({ twilioAuthToken: AUTH_TOKEN, publicBaseUrl: "https://hooks.example.com" }));
      const params = { MessageSid: "SM203", MessageStatus: "sent" };
      const signature = getExpectedTwilioSignature(AUTH_TOKEN, "https://hooks.example.com/twilio/status", params);

      const res = await post("/twilio/status", params, { "X-Twilio-Signature": signature });

      expect(res.status).toBe(200);
    });
  });
});
