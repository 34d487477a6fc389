import { Parser } from '../src/Parser';

describe('The Parser', () => {

  it('matches words ignoring case', () => {
    const p = new Parser('Register 10');
    expect(p.matchWord('register')).toBe(true);
    expect(p.getCurrentPos()).toBe(8);
    expect(p.matchWord('x')).toBe(false);
    expect(p.getCurrentPos()).toBe(8);
  });

  it('does not match a word cut off by the end of the text', () => {
    const p = new Parser('reg');
    expect(p.matchWord('register')).toBe(false);
    expect(p.getCurrentPos()).toBe(0);
  });

  it('reads characters up to a limit', () => {
    const p = new Parser('12345/');
    expect(p.readWhile(Parser.isDigit, 2)).toBe(2);
    expect(p.readWhile(Parser.isDigit)).toBe(3);
    expect(p.getCurrentChar()).toBe('/');
  });

  it('returns the text between a marker and the cursor', () => {
    const p = new Parser('  1.234,56 of');
    expect(p.skipWhitespace()).toBe(2);
    p.setMarkerWithCurrentPos('amount');
    p.skipChars('0123456789.,');
    expect(p.getTextFromMarkerToCurrentPos('amount')).toBe('1.234,56');
    expect(p.getRest()).toBe(' of');
  });

  it('goes back to a marker', () => {
    const p = new Parser('with description');
    p.setMarkerWithCurrentPos('start');
    p.matchWord('with');
    p.setPosBackToMarker('start');
    expect(p.getCurrentPos()).toBe(0);
    expect(p.getTextFromMarkerToCurrentPos('unknown')).toBe('');
  });

  it('picks the first matching word', () => {
    const p = new Parser('US$ 5');
    expect(p.matchOneOf(['r$', 'us$', '$'])).toBe('us$');
    expect(p.matchOneOf(['r$', 'us$', '$'])).toBeNull();
  });

  it('stops at the end of the data', () => {
    const p = new Parser('a');
    expect(p.nextPos()).toBe(true);
    expect(p.nextPos()).toBe(false);
    expect(p.isAtEnd()).toBe(true);
    expect(p.getCurrentChar()).toBe('');
  });
});
