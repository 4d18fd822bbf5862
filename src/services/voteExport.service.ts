import { BallotRecord, OptionRecord, VoteRecord } from "../types/voting";

export type ExportFormat = "csv" | "json";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["csv", "json"];

export type ExportFile = {
  filename: string;
  mimeType: string;
  content: string;
};

const csvCell = (value: string | number) => {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

const csvRow = (cells: Array<string | number>) => cells.map(csvCell).join(",");

/** Voter keys are deliberately left out of every export. */
export function buildCsvExport(
  vote: VoteRecord,
  options: readonly OptionRecord[],
  ballots: readonly BallotRecord[]
): ExportFile {
  const header = [
    "Voter First Name",
    "Voter Last Name",
    "Submitted At",
    ...options.map((option) => `Rating: ${option.title}`),
  ];

  const rows = ballots.map((ballot) =>
    csvRow([
      ballot.voterFirstName,
      ballot.voterLastName,
      ballot.submittedAt.toISOString(),
      ...options.map((option) => ballot.ratings[option.optionId] ?? ""),
    ])
  );

  return {
    filename: `vote_${vote.slug}_export.csv`,
    mimeType: "text/csv",
    content: [csvRow(header), ...rows].join("\n") + "\n",
  };
}

export function buildJsonExport(
  vote: VoteRecord,
  options: readonly OptionRecord[],
  ballots: readonly BallotRecord[],
  exportedAt: Date = new Date()
): ExportFile {
  const data = {
    vote: {
      id: vote.voteId,
      title: vote.title,
      description: vote.description,
      slug: vote.slug,
      status: vote.status,
      created_at: vote.createdAt.toISOString(),
      starts_at: vote.startsAt ? vote.startsAt.toISOString() : null,
      ends_at: vote.endsAt ? vote.endsAt.toISOString() : null,
    },
    options: options.map((option) => ({
      id: option.optionId,
      title: option.title,
      content: option.content,
      option_type: option.optionType,
      display_order: option.displayOrder,
    })),
    responses: ballots.map((ballot) => ({
      id: ballot.ballotId,
      voter_first_name: ballot.voterFirstName,
      voter_last_name: ballot.voterLastName,
      responses: ballot.ratings,
      submitted_at: ballot.submittedAt.toISOString(),
    })),
    export_metadata: {
      export_date: exportedAt.toISOString(),
      total_responses: ballots.length,
      total_options: options.length,
    },
  };

  return {
    filename: `vote_${vote.slug}_export.json`,
    mimeType: "application/json",
    content: JSON.stringify(data, null, 2),
  };
}

export function buildExport(
  format: ExportFormat,
  vote: VoteRecord,
  options: readonly OptionRecord[],
  ballots: readonly BallotRecord[]
): ExportFile {
  return format === "csv" ? buildCsvExport(vote, options, ballots) : buildJsonExport(vote, options, ballots);
}
