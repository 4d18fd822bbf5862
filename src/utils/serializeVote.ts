import { OptionRecord, VoteRecord } from "../types/voting";

export const serializeOption = (option: OptionRecord) => ({
  optionId: option.optionId,
  optionType: option.optionType,
  title: option.title,
  content: option.content,
  displayOrder: option.displayOrder,
  createdAt: option.createdAt,
});

export const serializeVote = (
  vote: VoteRecord,
  options?: readonly OptionRecord[],
  { includeCreator = true }: { includeCreator?: boolean } = {}
) => ({
  voteId: vote.voteId,
  ...(includeCreator ? { creatorId: vote.creatorId } : {}),
  title: vote.title,
  description: vote.description,
  slug: vote.slug,
  status: vote.status,
  startsAt: vote.startsAt,
  endsAt: vote.endsAt,
  createdAt: vote.createdAt,
  updatedAt: vote.updatedAt,
  ...(options ? { options: options.map(serializeOption) } : {}),
});
