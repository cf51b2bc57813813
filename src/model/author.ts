import { InvalidArgumentError } from "../errors.js";
import { hasText, stringCompareBinary } from "../util/order.js";

/** Person who authored a commit or a file revision. Identity is the name. */
export class Author {
  readonly name: string;
  readonly email: string | undefined;

  private constructor(name: string, email: string | undefined) {
    this.name = name;
    this.email = email;
  }

  static as(name: string, email?: string | null): Author {
    if (!hasText(name)) {
      throw new InvalidArgumentError(`Author name [${name}] is required`);
    }
    return new Author(name.trim(), hasText(email) ? email.trim() : undefined);
  }

  /** `Name <email>`, `Name email` or just `Name`. */
  static parse(text: string): Author {
    const value = (text ?? "").trim();
    const angled = value.match(/^(.*?)\s*<([^>]*)>$/);
    if (angled) return Author.as(angled[1], angled[2]);
    const space = value.lastIndexOf(" ");
    if (space > 0 && value.slice(space + 1).includes("@")) {
      return Author.as(value.slice(0, space), value.slice(space + 1));
    }
    return Author.as(value);
  }

  withEmail(email: string | null | undefined): Author {
    return Author.as(this.name, email);
  }

  /** Case-insensitive match against the name or email. */
  matches(text: string): boolean {
    const needle = text.trim().toLowerCase();
    return this.name.toLowerCase() === needle || (this.email ?? "").toLowerCase() === needle;
  }

  /** Case-insensitive substring match against the name or email. */
  resembles(text: string): boolean {
    const needle = text.trim().toLowerCase();
    return this.name.toLowerCase().includes(needle) || (this.email ?? "").toLowerCase().includes(needle);
  }

  equals(that: unknown): boolean {
    return that instanceof Author && that.name === this.name;
  }

  compareTo(that: Author): number {
    return stringCompareBinary(this.name, that.name);
  }

  toString(): string {
    return this.email ? `${this.name} <${this.email}>` : this.name;
  }
}
