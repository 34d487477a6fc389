export class Parser {
  protected curPos = 0;
  protected marker: { [index: string]: number } = {};

  constructor(protected data: string) {
  }

  public getCurrentPos() {
    return this.curPos;
  }

  public setCurrentPos(pos: number) {
    this.curPos = Math.min(Math.max(pos, 0), this.data.length);
  }

  public setMarkerWithCurrentPos(mark: string) {
    this.marker[mark] = this.curPos;
  }

  public setPosBackToMarker(mark: string) {
    const pos = this.marker[mark];
    if (pos !== undefined) {
      this.curPos = pos;
    }
  }

  public getTextFromMarkerToCurrentPos(mark: string): string {
    const pos = this.marker[mark];
    return pos === undefined ? '' : this.data.substring(pos, this.curPos);
  }

  public getCurrentChar(): string {
    return this.curPos < this.data.length ? this.data[this.curPos] : '';
  }

  public hasNext(): boolean {
    return this.curPos < this.data.length;
  }

  public nextPos(): boolean {
    if (!this.hasNext()) {
      return false;
    }
    this.curPos += 1;
    return true;
  }

  public isAtEnd(): boolean {
    return !this.hasNext();
  }

  public getRest(): string {
    return this.data.substring(this.curPos);
  }

  // Returns the number of characters consumed.
  public readWhile(accept: (char: string) => boolean, max = Infinity): number {
    const start = this.curPos;
    while (this.hasNext() && this.curPos - start < max && accept(this.getCurrentChar())) {
      this.curPos += 1;
    }
    return this.curPos - start;
  }

  public skipWhitespace(): number {
    return this.readWhile(Parser.isWhitespace);
  }

  public skipChars(chars: string): number {
    return this.readWhile(c => chars.includes(c));
  }

  /**
   * Consumes `word` when it follows the cursor, ignoring case.
   */
  public matchWord(word: string): boolean {
    const candidate = this.data.substr(this.curPos, word.length);
    if (candidate.length !== word.length || candidate.toLowerCase() !== word.toLowerCase()) {
      return false;
    }
    this.curPos += word.length;
    return true;
  }

  // Tries the words in order and returns the one consumed.
  public matchOneOf(words: string[]): string | null {
    for (const word of words) {
      if (this.matchWord(word)) {
        return word;
      }
    }
    return null;
  }

  public static isWhitespace(char: string) {
    return /\s/.test(char);
  }

  public static isDigit(char: string) {
    return char >= '0' && char <= '9';
  }
}
