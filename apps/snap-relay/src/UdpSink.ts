import dgram from "node:dgram";

export interface EventSink {
  send(payload: string): Promise<void>;
  close(): Promise<void>;
}

/** The part of a dgram socket the sink uses. */
export interface DatagramSocket {
  send(msg: string, port: number, address: string, callback: (error: Error | null) => void): void;
  close(callback?: () => void): void;
}

export type UdpTarget = { host: string; port: number };

/** Fire-and-forget JSON datagrams, one per frame. */
export class UdpSink implements EventSink {
  constructor(
    private readonly target: UdpTarget,
    private readonly socket: DatagramSocket = dgram.createSocket("udp4")
  ) {}

  send(payload: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.send(payload, this.target.port, this.target.host, (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  close(): Promise<void> {
    return new Promise<void>((resolve) => this.socket.close(() => resolve()));
  }
}
