import { MAX_RATING, MIN_RATING } from "../constants/voting";
import { OptionResult, RatingDistribution, ResultSummary } from "../types/voting";
import { DataIntegrityError } from "../utils/errors";

type BallotRatings = { readonly ratings: Readonly<Record<string, number>> };

type Accumulator = {
  optionId: string;
  count: number;
  sum: number;
  distribution: RatingDistribution;
};

const emptyDistribution = (): RatingDistribution => ({ "-2": 0, "-1": 0, "0": 0, "1": 0, "2": 0 });

const distributionKey = (rating: number): keyof RatingDistribution => {
  switch (rating) {
    case -2:
      return "-2";
    case -1:
      return "-1";
    case 0:
      return "0";
    case 1:
      return "1";
    default:
      return "2";
  }
};

const isScaleValue = (rating: number) =>
  Number.isInteger(rating) && rating >= MIN_RATING && rating <= MAX_RATING;

/**
 * Orders two accumulators with data by average, highest first.
 * Averages are compared as exact fractions (a/b vs c/d by a*d vs c*b) so two
 * equal averages never split on floating point noise. Counts are positive.
 */
const compareAverages = (a: Accumulator, b: Accumulator) =>
  b.sum * a.count - a.sum * b.count;

/**
 * Aggregates ballots into per-option statistics with a dense ranking.
 *
 * Unknown option ids in a ballot are skipped and counted; an out-of-scale
 * rating for a known option throws DataIntegrityError and no summary is
 * returned. Options nobody rated get a null average and share the rank after
 * the last rated option.
 */
export function computeResults(
  ballots: readonly BallotRatings[],
  optionIds: readonly string[]
): ResultSummary {
  const accumulators = new Map<string, Accumulator>();
  optionIds.forEach((optionId) => {
    if (!accumulators.has(optionId)) {
      accumulators.set(optionId, {
        optionId,
        count: 0,
        sum: 0,
        distribution: emptyDistribution(),
      });
    }
  });

  let unknownOptionEntries = 0;

  for (const ballot of ballots) {
    for (const [optionId, rating] of Object.entries(ballot.ratings)) {
      const acc = accumulators.get(optionId);
      if (!acc) {
        unknownOptionEntries += 1;
        continue;
      }
      if (!isScaleValue(rating)) {
        throw new DataIntegrityError(optionId, rating);
      }
      acc.count += 1;
      acc.sum += rating;
      acc.distribution[distributionKey(rating)] += 1;
    }
  }

  const all = Array.from(accumulators.values());
  // Array#sort is stable, so ties keep their input order
  const rated = all.filter((acc) => acc.count > 0).sort(compareAverages);
  const unrated = all.filter((acc) => acc.count === 0);

  const options: OptionResult[] = [];
  let rank = 0;
  rated.forEach((acc, index) => {
    if (index === 0 || compareAverages(rated[index - 1], acc) !== 0) {
      rank += 1;
    }
    options.push(toOptionResult(acc, rank));
  });

  const unratedRank = rank + 1;
  unrated.forEach((acc) => options.push(toOptionResult(acc, unratedRank)));

  return {
    totalBallots: ballots.length,
    unknownOptionEntries,
    options,
  };
}

function toOptionResult(acc: Accumulator, rank: number): OptionResult {
  return {
    optionId: acc.optionId,
    count: acc.count,
    sum: acc.sum,
    average: acc.count > 0 ? acc.sum / acc.count : null,
    rank,
    distribution: { ...acc.distribution },
  };
}
