import { Exceptions } from './Exceptions';

const DAY_MONTH_YEAR = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const DECIMAL = /^(\d+(\.\d*)?|\.\d+)$/;

export class Helper {

  public static getNrWithLeadingNulls(nr: number, len: number) {
    const stxt = nr + '';
    let ltxt = '';
    const neu = len - stxt.length;
    for (let i = 0; i < neu; i += 1) {
      ltxt += '0';
    }
    ltxt += stxt;
    return ltxt;
  }

  /**
   * Formats the UTC calendar day of `date` as YYYY-MM-DD.
   */
  public static convertDateToIsoFormat(date: Date) {
    const yyyy = this.getNrWithLeadingNulls(date.getUTCFullYear(), 4);
    const mm = this.getNrWithLeadingNulls(date.getUTCMonth() + 1, 2);
    const dd = this.getNrWithLeadingNulls(date.getUTCDate(), 2);
    return yyyy + '-' + mm + '-' + dd;
  }

  /**
   * Converts DD/MM/YYYY or DD-MM-YYYY (separators may be mixed) to YYYY-MM-DD.
   * Returns null when the text is not a real calendar date.
   */
  public static convertDayMonthYearToIsoFormat(txt: string): string | null {
    const m = DAY_MONTH_YEAR.exec(txt.replace(/-/g, '/'));
    if (!m) {
      return null;
    }
    const day = parseInt(m[1], 10);
    const month = parseInt(m[2], 10);
    const year = parseInt(m[3], 10);
    if (year < 1) {
      return null;
    }
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
      return null;
    }
    return this.convertDateToIsoFormat(date);
  }

  // Stored dates without an offset are read as UTC, like the Date bounds.
  public static getJSDateFromStored(value: string) {
    if (ISO_DATE.test(value)) {
      return new Date(value + 'T00:00:00Z');
    }
    if (ISO_DATE_TIME.test(value)) {
      return new Date(value.replace(' ', 'T') + 'Z');
    }
    return new Date(value.replace(' ', 'T'));
  }

  /**
   * Reads an amount written with '.' as thousands separator and ',' as
   * decimal separator: "1.234,56" is 1234.56.
   */
  public static convertAmountToNumber(literal: string) {
    const normalized = literal.split('.').join('').split(',').join('.');
    if (!DECIMAL.test(normalized)) {
      throw new Exceptions.InvalidAmountException(literal);
    }
    return parseFloat(normalized);
  }
}
