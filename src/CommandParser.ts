import { Helper } from './Helper';
import { Logger } from './Logger';
import { Parser } from './Parser';
import { toTransactionKind } from './TransactionKind';
import { TransactionRecord } from './TransactionRecord';

// Parses a single sentence of the form
//
//   [register [in the database]] [currency] <amount> of <revenue|expense>[s] on <DD/MM/YYYY>
//     [with description <text>]
//
// Words are matched ignoring case, the amount uses '.' for thousands and ',' for
// decimals, and the date separators may be '/' or '-'.

const CURRENCY_MARKERS = ['r$', 'us$', '$', '€', '£'];
const KIND_WORDS = ['revenue', 'expense'];
const AMOUNT_CHARS = '0123456789.,';
const DATE_SEPARATORS = '/-';

interface CommandSlots {
  amount: string;
  kind: string;
  date: string;
  description: string | null;
}

const isTrailing = (c: string) => Parser.isWhitespace(c) || c === '.';

export class CommandParser {

  private get log() {
    return Logger.getLogger('parser');
  }

  /**
   * Returns the record described by `text`, or null when the sentence does not
   * appear anywhere in it.
   *
   * @throws Exceptions.InvalidAmountException when the sentence matches but its
   * amount is not a decimal number, such as "1,2,3".
   */
  public extract(text: string): TransactionRecord | null {
    const txt = text.trim();
    const slots = this.findCommand(txt);
    if (!slots) {
      this.log.debug({ text: txt }, 'No command found');
      return null;
    }
    const amount = Helper.convertAmountToNumber(slots.amount);
    const date = Helper.convertDayMonthYearToIsoFormat(slots.date);
    const kind = toTransactionKind(slots.kind);
    if (!date || !kind) {
      this.log.debug({ text: txt, date: slots.date }, 'Command has no valid calendar date');
      return null;
    }
    return new TransactionRecord(date, kind, amount, slots.description);
  }

  private findCommand(txt: string): CommandSlots | null {
    const parser = new Parser(txt);
    for (let start = 0; start < txt.length; start += 1) {
      parser.setCurrentPos(start);
      const slots = this.matchCommand(parser);
      if (slots) {
        return slots;
      }
    }
    return null;
  }

  private matchCommand(p: Parser): CommandSlots | null {
    this.matchRegisterPhrase(p);

    if (p.matchOneOf(CURRENCY_MARKERS)) {
      p.skipWhitespace();
    }

    p.setMarkerWithCurrentPos('amount');
    if (p.skipChars(AMOUNT_CHARS) === 0) {
      return null;
    }
    const amount = p.getTextFromMarkerToCurrentPos('amount');

    if (!p.skipWhitespace() || !p.matchWord('of') || !p.skipWhitespace()) {
      return null;
    }

    const kind = p.matchOneOf(KIND_WORDS);
    if (!kind) {
      return null;
    }
    p.matchWord('s');

    if (!p.skipWhitespace() || !p.matchWord('on') || !p.skipWhitespace()) {
      return null;
    }

    const date = this.matchDate(p);
    if (!date) {
      return null;
    }

    p.setMarkerWithCurrentPos('tail');
    const description = this.matchDescription(p);
    if (description !== undefined) {
      return { amount, kind, date, description };
    }
    p.setPosBackToMarker('tail');
    p.readWhile(isTrailing);
    if (!p.isAtEnd()) {
      return null;
    }
    return { amount, kind, date, description: null };
  }

  // "register" and "register in the database" are both optional prefixes.
  private matchRegisterPhrase(p: Parser) {
    p.setMarkerWithCurrentPos('register');
    if (!p.matchWord('register')) {
      return;
    }
    p.setMarkerWithCurrentPos('database');
    const inTheDatabase = ['in', 'the', 'database'].every(word => p.skipWhitespace() > 0 && p.matchWord(word));
    if (!inTheDatabase) {
      p.setPosBackToMarker('database');
    }
    if (!p.skipWhitespace()) {
      p.setPosBackToMarker('register');
    }
  }

  private matchDate(p: Parser): string | null {
    p.setMarkerWithCurrentPos('date');
    const groups = [2, 2, 4];
    for (let i = 0; i < groups.length; i += 1) {
      if (i > 0) {
        if (!p.hasNext() || !DATE_SEPARATORS.includes(p.getCurrentChar())) {
          return null;
        }
        p.nextPos();
      }
      const len = p.readWhile(Parser.isDigit, groups[i]);
      if (len === 0 || (i === 2 && len !== 4)) {
        return null;
      }
    }
    return p.getTextFromMarkerToCurrentPos('date');
  }

  // undefined when there is no clause. The text stays on one line; trailing
  // whitespace and periods are dropped unless nothing else is left.
  private matchDescription(p: Parser): string | undefined {
    if (!p.skipWhitespace() || !p.matchWord('with') || !p.skipWhitespace()
      || !p.matchWord('description') || !p.skipWhitespace() || p.isAtEnd()) {
      return undefined;
    }
    const rest = p.getRest();
    const text = rest.replace(/[\s.]+$/, '') || rest.charAt(0);
    if (text.includes('\n')) {
      return undefined;
    }
    return text.trim();
  }
}

const defaultParser = new CommandParser();

export function extract(text: string): TransactionRecord | null {
  return defaultParser.extract(text);
}
