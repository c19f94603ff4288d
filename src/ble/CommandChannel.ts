import { COMMAND_SETTLE_DELAY_MS, sleep } from '../settings';
import { assertFrame, type CommandFrame } from '../protocol/commands';
import { WriteType, type BleCharacteristic, type BlePeripheral } from './transport';

/**
 * Fire-and-forget writes to the command characteristic. Write errors reach
 * the caller unchanged; a stateful frame is never re-sent from here.
 */
export class CommandChannel {
  constructor(
    private readonly peripheral: BlePeripheral,
    private readonly characteristic: BleCharacteristic,
    private readonly settleDelayMs = COMMAND_SETTLE_DELAY_MS,
  ) {}

  async send(frame: CommandFrame): Promise<void> {
    assertFrame(frame);
    await this.peripheral.write(this.characteristic, frame, WriteType.WithoutResponse);
    await sleep(this.settleDelayMs);
  }
}
