import type { CardDocument, CardId, MtgoId } from './types';

export interface ImageSource {
  getImagePath(card: Card, format: string): Promise<string>;
}

/** Read-only view of one resolved card. */
export class Card {
  readonly id: CardId;
  readonly name: string;
  readonly mtgoId?: MtgoId;
  private readonly doc: CardDocument;
  private readonly images: ImageSource;

  constructor(doc: CardDocument, images: ImageSource) {
    this.id = doc.id;
    this.name = doc.name;
    this.mtgoId = doc.mtgo_id;
    this.doc = doc;
    this.images = images;
  }

  /** The full upstream document. */
  get data(): CardDocument {
    return this.doc;
  }

  getImagePath(format: string): Promise<string> {
    return this.images.getImagePath(this, format);
  }

  toJSON(): CardDocument {
    return this.doc;
  }

  toString(): string {
    return `Card[${this.name} @ ${this.id}]`;
  }
}
