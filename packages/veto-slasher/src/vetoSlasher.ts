import type {SlashingParams} from "@slashwatch/params";
import type {
  Amount,
  Duration,
  ExecutionReceipt,
  Rejection,
  RequestReceipt,
  SlashIndex,
  SlashSubject,
  SlashingSystem,
  Timestamp,
} from "@slashwatch/types";
import {Err, Logger, Result, bigIntMin} from "@slashwatch/utils";
import {Checkpoints} from "./checkpoints.js";
import {ManualClock} from "./clock.js";
import {RejectionReason, VetoSlasherError, VetoSlasherErrorCode} from "./errors.js";

export type VetoSlasherOpts = {
  /** Only subject with stake, commands for any other subject are rejected */
  subject: SlashSubject;
  /** Network limit of the subject, caps its stake */
  networkLimit: Amount;
  /** Stake deposited in the vault */
  activeStake: Amount;
  vetoDuration: Duration;
  epochDuration: Duration;
  /** Initial clock time, stake is active from then on */
  genesisTime: Timestamp;
};

type SlashRequest = {
  amount: Amount;
  captureTimestamp: Timestamp;
  vetoDeadline: Timestamp;
  completed: boolean;
};

function reject(reason: RejectionReason): Err<Rejection> {
  return Err({reason});
}

/**
 * Veto slasher of a single vault with one delegated subject. Requests wait `vetoDuration` before they can be
 * executed, a capture timestamp stays slashable for `epochDuration`, and executions may never go back to a
 * capture timestamp older than the latest executed one.
 *
 * Cumulative slash is checkpointed at execution time. Commands are included at the current clock time.
 */
export class VetoSlasher implements SlashingSystem {
  readonly clock: ManualClock;
  private readonly requests: SlashRequest[] = [];
  private readonly cumulativeSlashCheckpoints = new Checkpoints();
  private latestSlashedCaptureTimestamp: Timestamp = 0;

  constructor(
    private readonly opts: VetoSlasherOpts,
    private readonly logger?: Logger
  ) {
    if (opts.vetoDuration >= opts.epochDuration) {
      throw new VetoSlasherError({
        code: VetoSlasherErrorCode.INVALID_OPTIONS,
        reason: "vetoDuration must be lower than epochDuration",
      });
    }
    this.clock = new ManualClock(opts.genesisTime);
  }

  get slashRequestsLength(): number {
    return this.requests.length;
  }

  isSubject(subject: SlashSubject): boolean {
    return subject.subnetwork === this.opts.subject.subnetwork && subject.operator === this.opts.subject.operator;
  }

  stakeAt(subject: SlashSubject, timestamp: Timestamp): Amount {
    if (!this.isSubject(subject) || timestamp < this.opts.genesisTime) {
      return BigInt(0);
    }
    return bigIntMin(this.opts.networkLimit, this.opts.activeStake);
  }

  cumulativeSlash(subject: SlashSubject): Amount {
    return this.isSubject(subject) ? this.cumulativeSlashCheckpoints.latest() : BigInt(0);
  }

  cumulativeSlashAt(subject: SlashSubject, timestamp: Timestamp): Amount {
    return this.isSubject(subject) ? this.cumulativeSlashCheckpoints.upperLookupRecent(timestamp) : BigInt(0);
  }

  slashableStake(subject: SlashSubject, captureTimestamp: Timestamp): Amount {
    const now = this.clock.currentTime();
    if (
      !this.isSubject(subject) ||
      captureTimestamp >= now ||
      captureTimestamp < now - this.opts.epochDuration ||
      captureTimestamp < this.latestSlashedCaptureTimestamp
    ) {
      return BigInt(0);
    }

    const stake = this.stakeAt(subject, captureTimestamp);
    const slashedSinceCapture = this.cumulativeSlash(subject) - this.cumulativeSlashAt(subject, captureTimestamp);
    return stake - bigIntMin(slashedSinceCapture, stake);
  }

  requestSlash(subject: SlashSubject, amount: Amount, captureTimestamp: Timestamp): Result<RequestReceipt, Rejection> {
    const now = this.clock.currentTime();
    if (!this.isSubject(subject)) {
      return reject(RejectionReason.UNKNOWN_SUBJECT);
    }

    if (captureTimestamp < now + this.opts.vetoDuration - this.opts.epochDuration || captureTimestamp >= now) {
      return reject(RejectionReason.INVALID_CAPTURE_TIMESTAMP);
    }

    const requestedAmount = bigIntMin(amount, this.slashableStake(subject, captureTimestamp));
    if (requestedAmount <= BigInt(0)) {
      return reject(RejectionReason.INSUFFICIENT_SLASH);
    }

    const slashIndex = this.requests.length;
    this.requests.push({
      amount: requestedAmount,
      captureTimestamp,
      vetoDeadline: now + this.opts.vetoDuration,
      completed: false,
    });
    this.logger?.debug("Slash requested", {slashIndex, amount: requestedAmount, captureTimestamp});

    return {slashIndex, timestamp: now};
  }

  executeSlash(subject: SlashSubject, slashIndex: SlashIndex): Result<ExecutionReceipt, Rejection> {
    const now = this.clock.currentTime();
    const request = Number.isInteger(slashIndex) && slashIndex >= 0 ? this.requests[slashIndex] : undefined;
    if (request === undefined) {
      return reject(RejectionReason.SLASH_REQUEST_NOT_EXIST);
    }
    if (!this.isSubject(subject)) {
      return reject(RejectionReason.UNKNOWN_SUBJECT);
    }
    if (request.vetoDeadline > now) {
      return reject(RejectionReason.VETO_PERIOD_NOT_ENDED);
    }
    if (now - request.captureTimestamp > this.opts.epochDuration) {
      return reject(RejectionReason.SLASH_PERIOD_ENDED);
    }
    if (request.completed) {
      return reject(RejectionReason.SLASH_REQUEST_COMPLETED);
    }
    if (this.latestSlashedCaptureTimestamp > request.captureTimestamp) {
      return reject(RejectionReason.OUTDATED_CAPTURE_TIMESTAMP);
    }

    const slashedAmount = bigIntMin(request.amount, this.slashableStake(subject, request.captureTimestamp));
    if (slashedAmount <= BigInt(0)) {
      return reject(RejectionReason.INSUFFICIENT_SLASH);
    }

    request.completed = true;
    this.latestSlashedCaptureTimestamp = request.captureTimestamp;
    this.cumulativeSlashCheckpoints.push(now, this.cumulativeSlashCheckpoints.latest() + slashedAmount);
    this.logger?.debug("Slash executed", {slashIndex, slashedAmount});

    return {slashedAmount, timestamp: now};
  }

  // SlashingSystem

  async currentTime(): Promise<Timestamp> {
    return this.clock.currentTime();
  }

  async advanceTime(by: Duration): Promise<void> {
    this.clock.advance(by);
  }

  async queryCumulativeSlash(subject: SlashSubject): Promise<Amount> {
    return this.cumulativeSlash(subject);
  }

  async queryCumulativeSlashAt(subject: SlashSubject, time: Timestamp): Promise<Amount> {
    return this.cumulativeSlashAt(subject, time);
  }

  async queryStakeAt(subject: SlashSubject, time: Timestamp): Promise<Amount> {
    return this.stakeAt(subject, time);
  }

  async querySlashable(subject: SlashSubject, captureTime: Timestamp): Promise<Amount> {
    return this.slashableStake(subject, captureTime);
  }

  async submitRequest(
    subject: SlashSubject,
    amount: Amount,
    captureTime: Timestamp
  ): Promise<Result<RequestReceipt, Rejection>> {
    return this.requestSlash(subject, amount, captureTime);
  }

  async submitExecution(subject: SlashSubject, slashIndex: SlashIndex): Promise<Result<ExecutionReceipt, Rejection>> {
    return this.executeSlash(subject, slashIndex);
  }
}

/** Vault deposit relative to the network limit, large enough for the limit to always bind */
const ACTIVE_STAKE_MULTIPLIER = BigInt(100);

/**
 * Slasher whose subject stake equals `NETWORK_CAPACITY` from `genesisTime` on
 */
export function createVetoSlasher(
  params: SlashingParams,
  subject: SlashSubject,
  genesisTime: Timestamp,
  logger?: Logger
): VetoSlasher {
  return new VetoSlasher(
    {
      subject,
      networkLimit: params.NETWORK_CAPACITY,
      activeStake: params.NETWORK_CAPACITY * ACTIVE_STAKE_MULTIPLIER,
      vetoDuration: params.VETO_DURATION,
      epochDuration: params.EPOCH_DURATION,
      genesisTime,
    },
    logger
  );
}
