import { z } from 'zod';
import {
  ankiRequest,
  ankiRequestNullable,
  CardInfo,
  CurrentCard,
  fieldValues,
  NoteInfo,
} from './anki-connect.js';
import type {
  CardStore,
  CardSummary,
  CurrentCardInfo,
  Note,
  NoteUpdate,
} from './types.js';

/**
 * CardStore backed by a running Anki instance through AnkiConnect.
 */
export class AnkiConnectStore implements CardStore {
  async deckNames(): Promise<string[]> {
    return await ankiRequest('deckNames', z.array(z.string()), {});
  }

  async findCards(query: string): Promise<number[]> {
    return await ankiRequest('findCards', z.array(z.number()), { query });
  }

  async findNotes(query: string): Promise<number[]> {
    return await ankiRequest('findNotes', z.array(z.number()), { query });
  }

  async cardsInfo(cardIds: number[]): Promise<CardSummary[]> {
    if (cardIds.length === 0) return [];
    const cards = await ankiRequest('cardsInfo', z.array(CardInfo), {
      cards: cardIds,
    });
    return cards.map((card) => ({
      cardId: card.cardId,
      noteId: card.note,
      deckName: card.deckName,
      due: card.due,
    }));
  }

  async notesInfo(noteIds: number[]): Promise<Note[]> {
    if (noteIds.length === 0) return [];
    const notes = await ankiRequest('notesInfo', z.array(NoteInfo), {
      notes: noteIds,
    });
    return notes.map((note) => ({
      noteId: note.noteId,
      modelName: note.modelName,
      fields: fieldValues(note.fields),
      tags: note.tags,
    }));
  }

  async getNoteTags(noteId: number): Promise<string[]> {
    return await ankiRequest('getNoteTags', z.array(z.string()), {
      note: noteId,
    });
  }

  async updateNote(update: NoteUpdate): Promise<void> {
    await ankiRequestNullable('updateNote', z.null(), { note: update });
  }

  async updateNoteFields(
    noteId: number,
    fields: Record<string, string>,
  ): Promise<void> {
    await ankiRequestNullable('updateNoteFields', z.null(), {
      note: { id: noteId, fields },
    });
  }

  async exportDeck(deckName: string, path: string): Promise<void> {
    const exported = await ankiRequest('exportPackage', z.boolean(), {
      deck: deckName,
      path,
      includeSched: false,
    });
    if (!exported) {
      throw new Error(`AnkiConnect could not export deck '${deckName}'`);
    }
  }

  async currentCard(): Promise<CurrentCardInfo | null> {
    const card = await ankiRequestNullable('guiCurrentCard', CurrentCard, {});
    if (!card) return null;
    return {
      cardId: card.cardId,
      deckName: card.deckName,
      modelName: card.modelName,
      question: card.question,
      fields: fieldValues(card.fields),
    };
  }
}
