/**
 * A note as read from the card store, with field values flattened.
 */
export type Note = {
  noteId: number;
  modelName: string;
  fields: Record<string, string>;
  tags: string[];
};

export type CardSummary = {
  cardId: number;
  // Absent when AnkiConnect could not resolve the card's note
  noteId?: number;
  deckName: string;
  due: number;
};

export type CurrentCardInfo = {
  cardId: number;
  deckName: string;
  modelName: string;
  question: string;
  fields: Record<string, string>;
};

export type NoteUpdate = {
  id: number;
  fields: Record<string, string>;
  tags: string[];
};

/**
 * The subset of AnkiConnect the fixer relies on. Commands talk to Anki
 * through this interface so tests can swap in an in-memory store.
 */
export interface CardStore {
  deckNames(): Promise<string[]>;
  findCards(query: string): Promise<number[]>;
  findNotes(query: string): Promise<number[]>;
  cardsInfo(cardIds: number[]): Promise<CardSummary[]>;
  notesInfo(noteIds: number[]): Promise<Note[]>;
  getNoteTags(noteId: number): Promise<string[]>;
  updateNote(update: NoteUpdate): Promise<void>;
  updateNoteFields(noteId: number, fields: Record<string, string>): Promise<void>;
  exportDeck(deckName: string, path: string): Promise<void>;
  currentCard(): Promise<CurrentCardInfo | null>;
}
