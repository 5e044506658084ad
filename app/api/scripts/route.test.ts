import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { POST } from "./route";

function chat(content: string) {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

function request(body: unknown) {
  return new Request("http://localhost/api/scripts", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

const base = {
  version: "dialog",
  category: "Travel",
  inputMethod: "text",
  content: "Buying a train ticket",
  model: "gpt-4o-mini",
  apiKey: "test-secret",
};

describe("POST /api/scripts", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("returns the parsed script with its translation", async () => {
    fetchMock
      .mockResolvedValueOnce(chat("ENGLISH TITLE: At the Station\nKOREAN TITLE: 기차역에서\nSCRIPT:\nA: One ticket, please.\nB: Sure."))
      .mockResolvedValueOnce(chat("A: 표 한 장 주세요.\nB: 네."));

    const res = await POST(request(base));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      result: {
        title: "At the Station",
        koreanTitle: "기차역에서",
        script: "A: One ticket, please.\nB: Sure.",
        translation: "A: 표 한 장 주세요.\nB: 네.",
      },
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const translationBody = JSON.parse(String(fetchMock.mock.calls[1]?.[1]?.body));
    expect(translationBody.messages[0].content).toContain("A: One ticket, please.\nB: Sure.");
  });

  it("still returns the script when the translation fails", async () => {
    fetchMock
      .mockResolvedValueOnce(chat("ENGLISH TITLE: Tickets\nKOREAN TITLE: 표\nSCRIPT:\nA: Hi."))
      .mockResolvedValueOnce(new Response("overloaded", { status: 503 }));

    const res = await POST(request(base));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      result: { title: "Tickets", koreanTitle: "표", script: "A: Hi." },
      warning: "Script generated, but the Korean translation failed.",
    });
  });

  it("sends the uploaded image along with the prompt", async () => {
    fetchMock.mockResolvedValueOnce(chat("SCRIPT:\nA: Look at that.")).mockResolvedValueOnce(chat("A: 저것 봐."));
    const image = "data:image/png;base64,iVBORw0KGgo=";

    const res = await POST(request({ ...base, inputMethod: "image", content: "A busy platform", image }));

    expect(res.status).toBe(200);
    const body = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body.messages[0].content[1]).toEqual({ type: "image_url", image_url: { url: image } });
    expect(body.messages[0].content[0].text).toContain("Input Type: image");
  });

  it("requires an image for image input", async () => {
    const res = await POST(request({ ...base, inputMethod: "image" }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "image: Upload an image for image input." });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects an unknown version", async () => {
    const res = await POST(request({ ...base, version: "sonnet" }));
    expect(res.status).toBe(400);
  });

  it("maps an upstream failure to 502", async () => {
    fetchMock.mockResolvedValueOnce(new Response("bad key", { status: 401 }));

    const res = await POST(request(base));

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "OpenAI API request failed (script:dialog).", code: "upstream_failed" });
  });
});
