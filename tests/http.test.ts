/**
 * HTTP transport Tests
 * FetchHttpClient against an in-process fetch stand-in
 */

import { BackendUnreachableError, CancelledError, TimeoutError } from "../src/core/errors";
import {
  BodyReaderLike,
  FetchHttpClient,
  FetchInit,
  FetchLike,
  FetchResponseLike,
  readLines,
  readText,
} from "../src/core/http";

const encoder = new TextEncoder();

async function* bytes(...chunks: Array<string | Uint8Array>): AsyncGenerator<Uint8Array, void, undefined> {
  for (const chunk of chunks) {
    yield typeof chunk === "string" ? encoder.encode(chunk) : chunk;
  }
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Reader that serves the given chunks, then waits for more until cancelled
 */
class ScriptedReader implements BodyReaderLike {
  cancelled = 0;
  private readonly chunks: Uint8Array[];

  constructor(chunks: string[], private readonly stall = false) {
    this.chunks = chunks.map((chunk) => encoder.encode(chunk));
  }

  async read(): Promise<{ done: boolean; value?: Uint8Array }> {
    const value = this.chunks.shift();
    if (value) {
      return { done: false, value };
    }
    if (this.stall) {
      return new Promise(() => undefined);
    }
    return { done: true };
  }

  async cancel(): Promise<void> {
    this.cancelled++;
  }
}

/**
 * Reader that behaves like fetch's body once the request is aborted: the
 * stream is errored and cancel() rejects with the abort.
 */
class AbortAwareReader extends ScriptedReader {
  signal?: AbortSignal;

  async cancel(): Promise<void> {
    await super.cancel();
    if (this.signal?.aborted) {
      throw new Error("This operation was aborted");
    }
  }
}

function respond(reader: BodyReaderLike | null, status = 200, statusText = "OK"): FetchResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    body: reader ? { getReader: () => reader } : null,
  };
}

describe("readLines", () => {
  test("splits on newlines and skips blank lines", async () => {
    await expect(collect(readLines(bytes("a\r\n\nb\n", "  \nc")))).resolves.toEqual(["a", "b", "c"]);
  });

  test("joins lines and characters split across chunks", async () => {
    const encoded = encoder.encode('{"text":"héllo"}\n');
    // Split inside the two-byte é
    const cut = 11;

    await expect(collect(readLines(bytes(encoded.slice(0, cut), encoded.slice(cut))))).resolves.toEqual([
      '{"text":"héllo"}',
    ]);
  });

  test("readText decodes the whole body", async () => {
    await expect(readText(bytes("hel", "lo"))).resolves.toBe("hello");
  });
});

describe("FetchHttpClient", () => {
  test("sends the request with a JSON Accept header", async () => {
    const calls: Array<{ url: string; init: FetchInit }> = [];
    const fetchImpl: FetchLike = async (url, init) => {
      calls.push({ url, init });
      return respond(new ScriptedReader(['{"ok":true}']));
    };
    const client = new FetchHttpClient(fetchImpl);

    const response = await client.send({
      method: "POST",
      url: "http://ollama.test/api/chat",
      headers: { "Content-Type": "application/json" },
      body: "{}",
    });

    expect(response.ok).toBe(true);
    await expect(response.text()).resolves.toBe('{"ok":true}');
    expect(calls[0].url).toBe("http://ollama.test/api/chat");
    expect(calls[0].init).toMatchObject({
      method: "POST",
      headers: { Accept: "application/json", "Content-Type": "application/json" },
      body: "{}",
    });
  });

  test("passes a non-success status through to the caller", async () => {
    const client = new FetchHttpClient(async () => respond(new ScriptedReader(["missing"]), 404, "Not Found"));

    const response = await client.send({ method: "GET", url: "http://ollama.test/api/tags" });

    expect(response).toMatchObject({ ok: false, status: 404, statusText: "Not Found" });
    await expect(response.text()).resolves.toBe("missing");
  });

  test("treats a missing body as empty", async () => {
    const client = new FetchHttpClient(async () => respond(null, 204, "No Content"));

    const response = await client.send({ method: "GET", url: "http://ollama.test/" });

    await expect(response.text()).resolves.toBe("");
  });

  test("wraps network failures in BackendUnreachableError", async () => {
    const client = new FetchHttpClient(async () => {
      throw new TypeError("fetch failed");
    });

    const sending = client.send({ method: "GET", url: "http://ollama.test/api/tags" });

    await expect(sending).rejects.toThrow(BackendUnreachableError);
    await expect(sending).rejects.toThrow("Request to http://ollama.test/api/tags failed: fetch failed");
  });

  test("times out when the body stalls longer than the low-speed window", async () => {
    const reader = new ScriptedReader(["partial\n"], true);
    const client = new FetchHttpClient(async () => respond(reader));
    const response = await client.send({ method: "GET", url: "http://ollama.test/slow", lowSpeedTimeoutMs: 20 });
    const received: string[] = [];

    const reading = (async () => {
      for await (const line of readLines(response.body)) {
        received.push(line);
      }
    })();

    await expect(reading).rejects.toThrow(TimeoutError);
    expect(received).toEqual(["partial"]);
  });

  test("aborting the caller signal cancels a pending read", async () => {
    const reader = new ScriptedReader([], true);
    let fetchSignal: AbortSignal | undefined;
    const client = new FetchHttpClient(async (_url, init) => {
      fetchSignal = init.signal;
      return respond(reader);
    });
    const controller = new AbortController();
    const response = await client.send({ method: "GET", url: "http://ollama.test/", signal: controller.signal });

    const reading = collect(response.body);
    controller.abort();

    await expect(reading).rejects.toThrow(CancelledError);
    expect(fetchSignal?.aborted).toBe(true);
  });

  test("an already aborted signal rejects at once", async () => {
    const client = new FetchHttpClient(async () => respond(null));
    const controller = new AbortController();
    controller.abort();

    await expect(client.send({ method: "GET", url: "http://ollama.test/", signal: controller.signal })).rejects.toThrow(
      CancelledError
    );
  });

  test("leaving the body early cancels the reader and aborts the request", async () => {
    const reader = new ScriptedReader(["one", "two"], true);
    let fetchSignal: AbortSignal | undefined;
    const client = new FetchHttpClient(async (_url, init) => {
      fetchSignal = init.signal;
      return respond(reader);
    });
    const response = await client.send({ method: "GET", url: "http://ollama.test/" });

    for await (const chunk of response.body) {
      expect(new TextDecoder().decode(chunk)).toBe("one");
      break;
    }

    expect(reader.cancelled).toBe(1);
    expect(fetchSignal?.aborted).toBe(true);
  });

  test("leaving the body early cancels the reader before aborting the request", async () => {
    const reader = new AbortAwareReader(["one", "two"], true);
    const client = new FetchHttpClient(async (_url, init) => {
      reader.signal = init.signal;
      return respond(reader);
    });
    const response = await client.send({ method: "GET", url: "http://ollama.test/" });

    const received: string[] = [];
    for await (const chunk of response.body) {
      received.push(new TextDecoder().decode(chunk));
      break;
    }

    expect(received).toEqual(["one"]);
    expect(reader.cancelled).toBe(1);
    expect(reader.signal?.aborted).toBe(true);
  });

  test("a reader whose cancel rejects still lets the consumer leave", async () => {
    const reader = new ScriptedReader(["one", "two"], true);
    jest.spyOn(reader, "cancel").mockRejectedValue(new Error("This operation was aborted"));
    let fetchSignal: AbortSignal | undefined;
    const client = new FetchHttpClient(async (_url, init) => {
      fetchSignal = init.signal;
      return respond(reader);
    });
    const response = await client.send({ method: "GET", url: "http://ollama.test/" });
    const iterator = response.body[Symbol.asyncIterator]();

    await iterator.next();

    await expect(iterator.return?.()).resolves.toEqual({ done: true, value: undefined });
    expect(fetchSignal?.aborted).toBe(true);
  });

  test("a body read to the end is not cancelled", async () => {
    const reader = new ScriptedReader(["one"]);
    const client = new FetchHttpClient(async () => respond(reader));
    const response = await client.send({ method: "GET", url: "http://ollama.test/" });

    await collect(response.body);

    expect(reader.cancelled).toBe(0);
  });
});
