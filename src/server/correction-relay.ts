import { applyAck } from "./protocol";
import type { ApplyCorrection, CorrectionApplier } from "./core/suggestion-session";

export type AckedSend = (request: ApplyCorrection) => Promise<unknown>;

/**
 * Hands corrections to the client that typed them and waits for its
 * acknowledgement. A negative, malformed or missing ack rejects.
 */
export class SocketCorrectionApplier implements CorrectionApplier {
  private readonly send: AckedSend;

  constructor(send: AckedSend) {
    this.send = send;
  }

  async apply(request: ApplyCorrection): Promise<void> {
    const ack = applyAck.safeParse(await this.send(request));
    if (!ack.success) throw new Error("Malformed acknowledgement from client");
    if (!ack.data.ok) throw new Error(ack.data.error ?? "Client could not apply the correction");
  }
}
