import mongoose, { ClientSession, FilterQuery } from "mongoose";
import { MIN_OPTIONS_TO_ACTIVATE, VOTE_STATUSES } from "../constants/voting";
import Ballot from "../models/Ballot";
import Vote, { IVote } from "../models/Vote";
import VoteOption from "../models/VoteOption";
import { NewOption, NewVote, OptionRecord, VoteRecord, VoteStatus } from "../types/voting";
import { isDuplicateKeyError } from "../utils/errors";

export type CreateVoteResult =
  | { success: true; vote: VoteRecord; options: OptionRecord[] }
  | { success: false; reason: "DUPLICATE_SLUG" };

export type VoteListFilter = {
  creatorId?: string;
  status?: VoteStatus;
  search?: string;
  skip: number;
  limit: number;
};

export type VotePatch = Partial<Pick<VoteRecord, "title" | "description" | "startsAt" | "endsAt">>;

export type OptionPatch = Partial<NewOption>;

export type OptionWriteFailure = "VOTE_NOT_FOUND" | "VOTE_NOT_DRAFT" | "OPTION_NOT_FOUND";

export type OptionWriteResult =
  | { success: true; option: OptionRecord }
  | { success: false; reason: OptionWriteFailure };

export type StatusChangeFailure = "VOTE_NOT_FOUND" | "STATUS_CHANGED" | "TOO_FEW_OPTIONS";

export type StatusChangeResult =
  | { success: true; vote: VoteRecord }
  | { success: false; reason: StatusChangeFailure };

export interface VoteStore {
  createVote(vote: NewVote, options: NewOption[]): Promise<CreateVoteResult>;
  findVoteById(voteId: string): Promise<VoteRecord | null>;
  findVoteBySlug(slug: string): Promise<VoteRecord | null>;
  /** `base` itself and its numbered `base-<n>` variants, where taken. */
  listSlugsLike(base: string): Promise<Set<string>>;
  listVotes(filter: VoteListFilter): Promise<{ votes: VoteRecord[]; total: number }>;
  /** Vote ids of one creator, any status. */
  listVoteIds(creatorId: string): Promise<string[]>;
  countByStatus(creatorId: string): Promise<Record<VoteStatus, number>>;
  /** Title, description and window only; status goes through changeStatus. */
  updateVote(voteId: string, patch: VotePatch): Promise<VoteRecord | null>;
  /**
   * Moves the vote from `from` to `to` only if it is still in `from`.
   * Activation also requires MIN_OPTIONS_TO_ACTIVATE options, counted in
   * the same step.
   */
  changeStatus(voteId: string, from: VoteStatus, to: VoteStatus): Promise<StatusChangeResult>;
  /** Removes the vote with its options and ballots. */
  deleteVote(voteId: string): Promise<boolean>;
  /** Ordered by displayOrder. */
  listOptions(voteId: string): Promise<OptionRecord[]>;
  /**
   * Option writes succeed only while the vote is a draft. The status check
   * and the write happen in one step, so no option can change once the
   * vote has been activated and ballots can arrive.
   */
  addOption(voteId: string, option: NewOption): Promise<OptionWriteResult>;
  updateOption(voteId: string, optionId: string, patch: OptionPatch): Promise<OptionWriteResult>;
  deleteOption(voteId: string, optionId: string): Promise<OptionWriteResult>;
}

type VoteLean = {
  _id: mongoose.Types.ObjectId;
  creatorId: string;
  title: string;
  description?: string;
  slug: string;
  status?: VoteStatus;
  startsAt?: Date | null;
  endsAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

type OptionLean = {
  _id: mongoose.Types.ObjectId;
  voteId: mongoose.Types.ObjectId;
  optionType?: "text" | "image";
  title: string;
  content?: string;
  displayOrder: number;
  createdAt: Date;
};

const toVoteRecord = (doc: VoteLean): VoteRecord => ({
  voteId: String(doc._id),
  creatorId: doc.creatorId,
  title: doc.title,
  description: doc.description || "",
  slug: doc.slug,
  status: doc.status || "draft",
  startsAt: doc.startsAt ?? null,
  endsAt: doc.endsAt ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toOptionRecord = (doc: OptionLean): OptionRecord => ({
  optionId: String(doc._id),
  voteId: String(doc.voteId),
  optionType: doc.optionType || "text",
  title: doc.title,
  content: doc.content || "",
  displayOrder: doc.displayOrder,
  createdAt: doc.createdAt,
});

class OptionWriteRejected extends Error {
  constructor(readonly reason: OptionWriteFailure) {
    super(reason);
    this.name = "OptionWriteRejected";
  }
}

class StatusChangeRejected extends Error {
  constructor(readonly reason: StatusChangeFailure) {
    super(reason);
    this.name = "StatusChangeRejected";
  }
}

async function runInTransaction(work: (session: ClientSession) => Promise<void>) {
  const session = await mongoose.startSession();
  try {
    await session.withTransaction(() => work(session));
  } finally {
    await session.endSession();
  }
}

const emptyStatusCounts = (): Record<VoteStatus, number> => ({ draft: 0, active: 0, closed: 0 });

const escapeRegex = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export class MongoVoteStore implements VoteStore {
  async createVote(vote: NewVote, options: NewOption[]): Promise<CreateVoteResult> {
    const created = await this.insertVote(vote);
    if (!created) {
      return { success: false, reason: "DUPLICATE_SLUG" };
    }

    try {
      const createdOptions = await VoteOption.insertMany(
        options.map((option) => ({ ...option, voteId: created._id }))
      );

      return {
        success: true,
        vote: toVoteRecord(created.toObject<VoteLean>()),
        options: createdOptions
          .map((option) => toOptionRecord(option.toObject<OptionLean>()))
          .sort((a, b) => a.displayOrder - b.displayOrder),
      };
    } catch (err: unknown) {
      // no vote without its options: undo the partial create, freeing the slug
      console.error("[Votes] Option insert failed, rolling back vote", String(created._id));
      await VoteOption.deleteMany({ voteId: created._id }).exec();
      await Vote.deleteOne({ _id: created._id }).exec();
      throw err;
    }
  }

  private async insertVote(vote: NewVote) {
    try {
      return await Vote.create({ ...vote, status: "draft" });
    } catch (err: unknown) {
      // slug is the only unique key on votes
      if (isDuplicateKeyError(err)) return null;
      throw err;
    }
  }

  async findVoteById(voteId: string): Promise<VoteRecord | null> {
    const doc = await Vote.findById(voteId).lean<VoteLean>().exec();
    return doc ? toVoteRecord(doc) : null;
  }

  async findVoteBySlug(slug: string): Promise<VoteRecord | null> {
    const doc = await Vote.findOne({ slug }).lean<VoteLean>().exec();
    return doc ? toVoteRecord(doc) : null;
  }

  async listSlugsLike(base: string): Promise<Set<string>> {
    const docs = await Vote.find({ slug: { $regex: `^${escapeRegex(base)}(-\\d+)?$` } })
      .select("slug")
      .lean<Array<{ slug: string }>>()
      .exec();
    return new Set(docs.map((doc) => doc.slug));
  }

  async listVotes(filter: VoteListFilter): Promise<{ votes: VoteRecord[]; total: number }> {
    const query: FilterQuery<IVote> = {};
    if (filter.creatorId) query.creatorId = filter.creatorId;
    if (filter.status) query.status = filter.status;
    if (filter.search) {
      const regex = new RegExp(escapeRegex(filter.search), "i");
      query.$or = [{ title: regex }, { description: regex }];
    }

    const [docs, total] = await Promise.all([
      Vote.find(query)
        .sort({ createdAt: -1 })
        .skip(filter.skip)
        .limit(filter.limit)
        .lean<VoteLean[]>()
        .exec(),
      Vote.countDocuments(query).exec(),
    ]);

    return { votes: docs.map(toVoteRecord), total };
  }

  async listVoteIds(creatorId: string): Promise<string[]> {
    const docs = await Vote.find({ creatorId }).select("_id").lean<Array<{ _id: mongoose.Types.ObjectId }>>().exec();
    return docs.map((doc) => String(doc._id));
  }

  async countByStatus(creatorId: string): Promise<Record<VoteStatus, number>> {
    const rows = await Vote.aggregate<{ _id: string; count: number }>([
      { $match: { creatorId } },
      { $group: { _id: "$status", count: { $sum: 1 } } },
    ]).exec();

    const counts = emptyStatusCounts();
    for (const row of rows) {
      const status = VOTE_STATUSES.find((candidate) => candidate === row._id);
      if (status) counts[status] = row.count;
    }
    return counts;
  }

  async updateVote(voteId: string, patch: VotePatch): Promise<VoteRecord | null> {
    const doc = await Vote.findByIdAndUpdate(voteId, { $set: patch }, { new: true, runValidators: true })
      .lean<VoteLean>()
      .exec();
    return doc ? toVoteRecord(doc) : null;
  }

  async changeStatus(voteId: string, from: VoteStatus, to: VoteStatus): Promise<StatusChangeResult> {
    const outcome: { vote: VoteRecord | null } = { vote: null };
    try {
      await runInTransaction(async (session) => {
        if (to === "active") {
          const optionCount = await VoteOption.countDocuments({ voteId }).session(session).exec();
          if (optionCount < MIN_OPTIONS_TO_ACTIVATE) throw new StatusChangeRejected("TOO_FEW_OPTIONS");
        }
        // same document as the option writes touch, so the two conflict
        const doc = await Vote.findOneAndUpdate(
          { _id: voteId, status: from },
          { $set: { status: to }, $inc: { optionRevision: 1 } },
          { new: true, session }
        )
          .lean<VoteLean>()
          .exec();
        if (!doc) {
          const exists = await Vote.exists({ _id: voteId }).session(session).exec();
          throw new StatusChangeRejected(exists ? "STATUS_CHANGED" : "VOTE_NOT_FOUND");
        }
        outcome.vote = toVoteRecord(doc);
      });
    } catch (err: unknown) {
      if (err instanceof StatusChangeRejected) return { success: false, reason: err.reason };
      throw err;
    }

    if (!outcome.vote) throw new Error(`Status change of ${voteId} committed without a vote`);
    return { success: true, vote: outcome.vote };
  }

  async deleteVote(voteId: string): Promise<boolean> {
    const deleted = await Vote.findByIdAndDelete(voteId).lean<VoteLean>().exec();
    if (!deleted) return false;
    await Promise.all([VoteOption.deleteMany({ voteId }).exec(), Ballot.deleteMany({ voteId }).exec()]);
    return true;
  }

  async listOptions(voteId: string): Promise<OptionRecord[]> {
    const docs = await VoteOption.find({ voteId })
      .sort({ displayOrder: 1, createdAt: 1 })
      .lean<OptionLean[]>()
      .exec();
    return docs.map(toOptionRecord);
  }

  async addOption(voteId: string, option: NewOption): Promise<OptionWriteResult> {
    return this.writeOptionWhileDraft(voteId, async (session) => {
      const [created] = await VoteOption.create([{ ...option, voteId }], { session });
      return toOptionRecord(created.toObject<OptionLean>());
    });
  }

  async updateOption(voteId: string, optionId: string, patch: OptionPatch): Promise<OptionWriteResult> {
    return this.writeOptionWhileDraft(voteId, async (session) => {
      const doc = await VoteOption.findOneAndUpdate(
        { _id: optionId, voteId },
        { $set: patch },
        { new: true, runValidators: true, session }
      )
        .lean<OptionLean>()
        .exec();
      return doc ? toOptionRecord(doc) : null;
    });
  }

  async deleteOption(voteId: string, optionId: string): Promise<OptionWriteResult> {
    return this.writeOptionWhileDraft(voteId, async (session) => {
      const doc = await VoteOption.findOneAndDelete({ _id: optionId, voteId }, { session })
        .lean<OptionLean>()
        .exec();
      return doc ? toOptionRecord(doc) : null;
    });
  }

  /**
   * Runs `write` in a transaction that first bumps optionRevision on the vote
   * where it is still a draft. An activation racing with the write touches
   * the same document, so one of the two aborts and retries against the
   * committed status.
   */
  private async writeOptionWhileDraft(
    voteId: string,
    write: (session: ClientSession) => Promise<OptionRecord | null>
  ): Promise<OptionWriteResult> {
    const outcome: { option: OptionRecord | null } = { option: null };
    try {
      await runInTransaction(async (session) => {
        const draft = await Vote.findOneAndUpdate(
          { _id: voteId, status: "draft" },
          { $inc: { optionRevision: 1 } },
          { session }
        )
          .lean<VoteLean>()
          .exec();
        if (!draft) {
          const exists = await Vote.exists({ _id: voteId }).session(session).exec();
          throw new OptionWriteRejected(exists ? "VOTE_NOT_DRAFT" : "VOTE_NOT_FOUND");
        }

        const option = await write(session);
        if (!option) throw new OptionWriteRejected("OPTION_NOT_FOUND");
        outcome.option = option;
      });
    } catch (err: unknown) {
      if (err instanceof OptionWriteRejected) return { success: false, reason: err.reason };
      throw err;
    }

    if (!outcome.option) throw new Error(`Option write on ${voteId} committed without an option`);
    return { success: true, option: outcome.option };
  }
}
