export namespace Exceptions {

  export class LedgerException extends Error {
    constructor(message: string) {
      super(message);
      Object.setPrototypeOf(this, LedgerException.prototype);
    }
    public toString() {
      return this.message ? this.message : 'LedgerException';
    }
  }

  export class InvalidAmountException extends LedgerException {
    public literal: string;
    constructor(literal: string) {
      super('InvalidAmount: ' + literal);
      this.literal = literal;
      Object.setPrototypeOf(this, InvalidAmountException.prototype);
    }
    public toString() {
      return 'The amount "' + this.literal + '" is not a number.';
    }
  }

  export class InvalidKindException extends LedgerException {
    public kind: string;
    constructor(kind: string) {
      super('InvalidKind: ' + kind);
      this.kind = kind;
      Object.setPrototypeOf(this, InvalidKindException.prototype);
    }
  }

  export class UnexpectedColumnValueException extends LedgerException {
    public column: string;
    constructor(column: string, value: string) {
      super('UnexpectedColumnValue: ' + column + '=' + value);
      this.column = column;
      Object.setPrototypeOf(this, UnexpectedColumnValueException.prototype);
    }
  }

  export class InvalidConfigException extends LedgerException {
    public key: string;
    public value: string;
    constructor(key: string, value: string) {
      super('InvalidConfig: ' + key + '=' + value);
      this.key = key;
      this.value = value;
      Object.setPrototypeOf(this, InvalidConfigException.prototype);
    }
  }

  export class StoreClosedException extends LedgerException {
    constructor() {
      super('StoreClosed');
      Object.setPrototypeOf(this, StoreClosedException.prototype);
    }
    public toString() {
      return 'The transaction store was already closed.';
    }
  }

}
