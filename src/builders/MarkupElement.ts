import { InvalidArgumentError } from '../core/errors';
import { MarkupNode } from '../core/models';

const INDENT_SIZE = 2;

/**
 * A tag in a markup tree, rendered as indented open/close tags
 */
export class MarkupElement {
  readonly children: MarkupElement[] = [];

  /**
   * An omitted argument defaults to the empty string; null is rejected
   */
  constructor(
    public name: string = '',
    public text: string = '',
  ) {
    if (name == null) {
      throw new InvalidArgumentError('name', 'Element name must not be null');
    }
    if (text == null) {
      throw new InvalidArgumentError('text', 'Element text must not be null');
    }
  }

  /**
   * Create an element from a name and text, rejecting missing values
   */
  static create(name: string, text: string): MarkupElement {
    if (name == null) {
      throw new InvalidArgumentError('name', 'Element name must not be null');
    }
    if (text == null) {
      throw new InvalidArgumentError('text', 'Element text must not be null');
    }
    return new MarkupElement(name, text);
  }

  /**
   * Render this element and its subtree, starting at the given depth
   */
  render(indent: number = 0): string {
    const pad = ' '.repeat(INDENT_SIZE * indent);
    let out = `${pad}<${this.name}>\n`;

    if (this.text.trim().length > 0) {
      out += `${' '.repeat(INDENT_SIZE * (indent + 1))}${this.text}\n`;
    }

    for (const child of this.children) {
      out += child.render(indent + 1);
    }

    out += `${pad}</${this.name}>\n`;
    return out;
  }

  /**
   * Plain copy of this subtree
   */
  toNode(): MarkupNode {
    return {
      name: this.name,
      text: this.text,
      children: this.children.map(child => child.toNode()),
    };
  }

  toString(): string {
    return this.render();
  }
}
