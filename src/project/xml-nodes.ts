/**
 * Helpers over the ordered node tree produced and consumed by fast-xml-parser
 * with `preserveOrder` enabled.
 *
 * Each element is an object with one key (the tag name) mapping to its child
 * list, plus an optional `:@` key holding prefixed attributes. Text is a
 * `{ '#text': value }` node.
 *
 * @packageDocumentation
 */

/** A node of the ordered tree. */
export type XmlNode = Record<string, unknown>;

/** Key holding the attributes of an element. */
export const ATTRIBUTES_KEY = ':@';

/** Key of a text node. */
export const TEXT_KEY = '#text';

/** Prefix of attribute names inside {@link ATTRIBUTES_KEY}. */
export const ATTRIBUTE_PREFIX = '@_';

function isRecord(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function scalarToString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/**
 * Narrows a parsed value to a node list, dropping anything that is not a node.
 *
 * @param value - Parser output or the child list of an element.
 * @returns The nodes of the list, or an empty list.
 */
export function asNodeList(value: unknown): XmlNode[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Returns the tag name of an element node.
 *
 * @param node - Any node.
 * @returns The tag name, or undefined for text and processing-instruction nodes.
 */
export function elementName(node: XmlNode): string | undefined {
  return Object.keys(node).find(
    (key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY && !key.startsWith('?')
  );
}

/**
 * Returns the element children of an element.
 *
 * @param node - The element node.
 * @param name - Tag name of the element.
 * @returns Child elements in document order.
 */
export function childElements(node: XmlNode, name: string): XmlNode[] {
  return asNodeList(node[name]).filter((child) => elementName(child) !== undefined);
}

/**
 * Reads an attribute of an element.
 *
 * @param node - The element node.
 * @param attribute - Attribute name without prefix.
 * @returns The attribute value, or undefined when absent.
 */
export function attributeOf(node: XmlNode, attribute: string): string | undefined {
  const attributes = node[ATTRIBUTES_KEY];
  if (!isRecord(attributes)) {
    return undefined;
  }
  return scalarToString(attributes[ATTRIBUTE_PREFIX + attribute]);
}

/**
 * Concatenates the direct text children of an element.
 *
 * @param node - The element node.
 * @param name - Tag name of the element.
 * @returns The text content, empty when the element has none.
 */
export function textOf(node: XmlNode, name: string): string {
  return asNodeList(node[name])
    .map((child) => scalarToString(child[TEXT_KEY]) ?? '')
    .join('');
}

/**
 * Builds an element node.
 *
 * @param name - Tag name.
 * @param children - Child nodes.
 * @param attributes - Attributes by unprefixed name; omitted when empty.
 * @returns The element node.
 */
export function element(
  name: string,
  children: XmlNode[],
  attributes?: Readonly<Record<string, string>>
): XmlNode {
  const node: XmlNode = { [name]: children };
  if (attributes !== undefined && Object.keys(attributes).length > 0) {
    node[ATTRIBUTES_KEY] = Object.fromEntries(
      Object.entries(attributes).map(([key, value]) => [ATTRIBUTE_PREFIX + key, value])
    );
  }
  return node;
}

/**
 * Builds an element holding only text.
 *
 * @param name - Tag name.
 * @param text - Text content; an empty string yields an empty element.
 * @param attributes - Attributes by unprefixed name.
 * @returns The element node.
 */
export function textElement(
  name: string,
  text: string,
  attributes?: Readonly<Record<string, string>>
): XmlNode {
  return element(name, text === '' ? [] : [{ [TEXT_KEY]: text }], attributes);
}
