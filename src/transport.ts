// src/transport.ts
import { request, type Dispatcher } from "undici";

export type HttpMethod = "GET" | "POST";

export type TransportRequest = {
  method: HttpMethod;
  url: string;
  body?: string;
  headers?: Record<string, string>;
};

export type TransportResponse = {
  status: number;
  text: string;
};

/** One physical HTTP exchange. Status handling belongs to the caller. */
export interface GraphTransport {
  send(req: TransportRequest): Promise<TransportResponse>;
}

export class UndiciTransport implements GraphTransport {
  constructor(private timeoutMs = 30_000, private dispatcher?: Dispatcher) {}

  async send(req: TransportRequest): Promise<TransportResponse> {
    const res = await request(req.url, {
      method: req.method,
      body: req.body,
      headers: req.headers,
      dispatcher: this.dispatcher,
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
    });
    const text = await res.body.text();
    return { status: res.statusCode, text };
  }
}
