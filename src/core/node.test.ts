import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { afterEach, describe, test, expect } from "vitest";
import { TransientNetworkError } from "#/errors";
import { fetchBinary } from "#/platform";
import { createEnvTokenProvider, createNodeHttpClient } from "./node";

const servers: Server[] = [];

async function serve(handler: (req: IncomingMessage, res: ServerResponse) => void): Promise<string> {
  const server = createServer(handler);
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return `http://127.0.0.1:${address.port}/mod.jar`;
}

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve) => {
          server.closeAllConnections();
          server.close(() => resolve());
        })
    )
  );
});

describe("createNodeHttpClient", () => {
  test("reads a complete body", async () => {
    const url = await serve((_req, res) => {
      res.writeHead(200, { "content-type": "application/java-archive" });
      res.end("jar-bytes");
    });

    const outcome = await fetchBinary(createNodeHttpClient(1_000), url, {}, { attempts: 1, delayMs: 0 });

    expect(outcome.found && outcome.value.toString()).toBe("jar-bytes");
  });

  test("times out a body that stalls after the headers", async () => {
    const url = await serve((_req, res) => {
      res.writeHead(200, { "content-length": "100" });
      res.write("partial");
    });

    const err = await fetchBinary(createNodeHttpClient(200), url, {}, { attempts: 1, delayMs: 0 }).then(
      () => undefined,
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(TransientNetworkError);
    expect(err instanceof TransientNetworkError && err.attempts).toBe(1);
  });
});

describe("createEnvTokenProvider", () => {
  test("reads the platform key and treats an empty value as unset", () => {
    const tokens = createEnvTokenProvider({ CURSEFORGE_API_KEY: "test-secret", MODRINTH_API_KEY: "" });

    expect(tokens.getApiKey("curseforge")).toBe("test-secret");
    expect(tokens.getApiKey("modrinth")).toBeUndefined();
  });
});
