export {
  CommandJournal,
  type CommandJournalEntry,
  formatJournalLine,
  type JournalAppend,
  type JournalKind,
  parseJournalLine,
} from "./command-journal";
