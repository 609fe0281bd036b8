import { Builder, parseStringPromise } from "xml2js";
import type {
  AppControl,
  Attribute,
  AttributeGroup,
  BatchOperationType,
  Content,
  DataFeed,
  Link,
  Price,
  Product,
  ProductFeed,
  ServiceError,
  Shipping,
  Tax,
} from "./model";

export const NS = {
  atom: "http://www.w3.org/2005/Atom",
  app: "http://www.w3.org/2007/app",
  gd: "http://schemas.google.com/g/2005",
  sc: "http://schemas.google.com/structuredcontent/2009",
  scp: "http://schemas.google.com/structuredcontent/2009/products",
  batch: "http://schemas.google.com/gdata/batch",
} as const;

export const ATOM_CONTENT_TYPE = "application/atom+xml; charset=UTF-8";
export const GDATA_ERROR_CONTENT_TYPE = "application/vnd.google.gdata.error+xml";

const NS_DECLARATIONS = {
  xmlns: NS.atom,
  "xmlns:app": NS.app,
  "xmlns:gd": NS.gd,
  "xmlns:sc": NS.sc,
  "xmlns:scp": NS.scp,
};

const BATCH_NS_DECLARATIONS = { ...NS_DECLARATIONS, "xmlns:batch": NS.batch };

type Prefix = "sc" | "scp";

type KeysOfType<T, V> = {
  [K in keyof T]-?: [NonNullable<T[K]>] extends [V] ? ([V] extends [NonNullable<T[K]>] ? K : never) : never;
}[keyof T];

const STRING_FIELDS: ReadonlyArray<readonly [KeysOfType<Product, string>, Prefix, string]> = [
  ["externalId", "sc", "id"],
  ["lang", "sc", "content_language"],
  ["country", "sc", "target_country"],
  ["channel", "sc", "channel"],
  ["expirationDate", "sc", "expiration_date"],
  ["adwordsGrouping", "scp", "adwords_grouping"],
  ["adwordsRedirect", "scp", "adwords_redirect"],
  ["ageGroup", "scp", "age_group"],
  ["author", "scp", "author"],
  ["availability", "scp", "availability"],
  ["brand", "scp", "brand"],
  ["condition", "scp", "condition"],
  ["edition", "scp", "edition"],
  ["gender", "scp", "gender"],
  ["genre", "scp", "genre"],
  ["googleProductCategory", "scp", "google_product_category"],
  ["gtin", "scp", "gtin"],
  ["itemGroupId", "scp", "item_group_id"],
  ["manufacturer", "scp", "manufacturer"],
  ["material", "scp", "material"],
  ["mpn", "scp", "mpn"],
  ["pattern", "scp", "pattern"],
  ["productReviewAverage", "scp", "product_review_average"],
  ["productReviewCount", "scp", "product_review_count"],
  ["productType", "scp", "product_type"],
  ["size", "scp", "size"],
  ["year", "scp", "year"],
];

const LIST_FIELDS: ReadonlyArray<readonly [KeysOfType<Product, string[]>, Prefix, string]> = [
  ["imageLinks", "sc", "image_link"],
  ["additionalImageLinks", "sc", "additional_image_link"],
  ["adwordsLabels", "scp", "adwords_labels"],
  ["adwordsQueryparam", "scp", "adwords_queryparam"],
  ["colors", "scp", "color"],
  ["feature", "scp", "feature"],
];

const BOOLEAN_FIELDS: ReadonlyArray<readonly [KeysOfType<Product, boolean>, Prefix, string]> = [
  ["adult", "sc", "adult"],
  ["featuredProduct", "scp", "featured_product"],
];

// ---------------------------------------------------------------------------
// Writing

type XmlObject = { [tag: string]: unknown };

const builder = new Builder({
  xmldec: { version: "1.0", encoding: "UTF-8" },
  renderOpts: { pretty: true, indent: "  ", newline: "\n" },
});

function attrs(values: Record<string, string | number | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(values)) {
    if (v !== undefined) out[k] = String(v);
  }
  return out;
}

function textWithAttrs(text: string, attributes: Record<string, string>): unknown {
  return Object.keys(attributes).length > 0 ? { $: attributes, _: text } : text;
}

function put(o: XmlObject, tag: string, value: string | number | boolean | undefined) {
  if (value !== undefined) o[tag] = String(value);
}

function linkObject(l: Link): XmlObject {
  return { $: attrs({ rel: l.rel, type: l.type, href: l.href }) };
}

function priceObject(p: Price): unknown {
  return textWithAttrs(p.value, { unit: p.unit });
}

function attributeObject(a: Attribute): unknown {
  return textWithAttrs(a.value ?? "", attrs({ name: a.name, type: a.type, unit: a.unit }));
}

function appControlObject(c: AppControl): XmlObject {
  const o: XmlObject = {};
  if (c.requiredDestinations.length > 0) {
    o["sc:required_destination"] = c.requiredDestinations.map((dest) => ({ $: { dest } }));
  }
  if (c.excludedDestinations.length > 0) {
    o["sc:excluded_destination"] = c.excludedDestinations.map((dest) => ({ $: { dest } }));
  }
  return o;
}

function shippingObject(s: Shipping): XmlObject {
  const o: XmlObject = {};
  put(o, "scp:shipping_country", s.country);
  put(o, "scp:shipping_region", s.region);
  put(o, "scp:shipping_service", s.service);
  if (s.price) o["scp:shipping_price"] = priceObject(s.price);
  return o;
}

function taxObject(t: Tax): XmlObject {
  const o: XmlObject = {};
  put(o, "scp:tax_country", t.country);
  put(o, "scp:tax_region", t.region);
  put(o, "scp:tax_rate", t.rate);
  put(o, "scp:tax_ship", t.shippingIsTaxed);
  return o;
}

function entryObject(p: Product): XmlObject {
  const o: XmlObject = {};
  put(o, "id", p.atomId);
  put(o, "title", p.title);
  if (p.content) o.content = textWithAttrs(p.content.value ?? "", attrs({ type: p.content.type }));
  if (p.links.length > 0) o.link = p.links.map(linkObject);
  if (p.appControl) o["app:control"] = appControlObject(p.appControl);

  for (const [key, prefix, tag] of STRING_FIELDS) put(o, `${prefix}:${tag}`, p[key]);
  for (const [key, prefix, tag] of LIST_FIELDS) {
    const values = p[key];
    if (values && values.length > 0) o[`${prefix}:${tag}`] = values;
  }
  for (const [key, prefix, tag] of BOOLEAN_FIELDS) put(o, `${prefix}:${tag}`, p[key]);

  if (p.attributes?.length) o["sc:attribute"] = p.attributes.map(attributeObject);
  if (p.attributeGroups?.length) {
    o["sc:group"] = p.attributeGroups.map((g) => ({
      $: attrs({ name: g.name }),
      "sc:attribute": g.attributes.map(attributeObject),
    }));
  }
  if (p.price) o["scp:price"] = priceObject(p.price);
  put(o, "scp:quantity", p.quantity);
  if (p.shippingRules?.length) o["scp:shipping"] = p.shippingRules.map(shippingObject);
  if (p.shippingWeight) o["scp:shipping_weight"] = textWithAttrs(p.shippingWeight.value, { unit: p.shippingWeight.unit });
  if (p.taxes?.length) o["scp:tax"] = p.taxes.map(taxObject);

  if (p.batchOperation) o["batch:operation"] = { $: { type: p.batchOperation } };
  put(o, "batch:id", p.batchId);
  return o;
}

/** Serializes a single product as an Atom entry document. */
export function productToXml(product: Product): string {
  return builder.buildObject({ entry: { $: NS_DECLARATIONS, ...entryObject(product) } });
}

/** Serializes products as an Atom feed carrying batch operations. */
export function productFeedToXml(entries: Product[]): string {
  return builder.buildObject({ feed: { $: BATCH_NS_DECLARATIONS, entry: entries.map(entryObject) } });
}

export function dataFeedToXml(feed: DataFeed): string {
  const o: XmlObject = { $: NS_DECLARATIONS };
  put(o, "title", feed.title);
  put(o, "sc:feed_file_name", feed.feedFileName);
  put(o, "sc:target_country", feed.targetCountry);
  put(o, "sc:content_language", feed.contentLanguage);
  if (feed.fileFormat) {
    const f: XmlObject = { $: attrs({ format: feed.fileFormat.format }) };
    put(f, "sc:delimiter", feed.fileFormat.delimiter);
    put(f, "sc:encoding", feed.fileFormat.encoding);
    put(f, "sc:use_quoted_fields", feed.fileFormat.useQuotedFields);
    o["sc:file_format"] = f;
  }
  return builder.buildObject({ entry: o });
}

// ---------------------------------------------------------------------------
// Reading

/** Namespace-resolved element. Children keep document order per tag name only. */
export type XmlElement = {
  uri: string;
  local: string;
  text: string;
  attributes: Record<string, string>;
  children: XmlElement[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function localName(qname: string): string {
  const i = qname.indexOf(":");
  return i >= 0 ? qname.slice(i + 1) : qname;
}

function toElement(raw: unknown, qname: string): XmlElement {
  const el: XmlElement = { uri: "", local: localName(qname), text: "", attributes: {}, children: [] };
  if (typeof raw === "string") {
    el.text = raw;
    return el;
  }
  if (!isRecord(raw)) return el;

  const ns = raw.$ns;
  if (isRecord(ns)) {
    if (typeof ns.uri === "string") el.uri = ns.uri;
    if (typeof ns.local === "string") el.local = ns.local;
  }
  if (typeof raw._ === "string") el.text = raw._;

  const rawAttrs = raw.$;
  if (isRecord(rawAttrs)) {
    for (const [name, a] of Object.entries(rawAttrs)) {
      if (typeof a === "string") {
        el.attributes[name] = a;
      } else if (isRecord(a) && a.uri === "" && typeof a.local === "string") {
        el.attributes[a.local] = String(a.value);
      }
    }
  }

  for (const [key, value] of Object.entries(raw)) {
    if (key === "_" || key === "$" || key === "$ns") continue;
    const items = Array.isArray(value) ? value : [value];
    for (const item of items) el.children.push(toElement(item, key));
  }
  return el;
}

export async function parseXml(xml: string): Promise<XmlElement> {
  const doc: unknown = await parseStringPromise(xml, { xmlns: true, explicitArray: true });
  if (!isRecord(doc)) throw new Error("XML document has no root element");
  const [rootName] = Object.keys(doc);
  if (rootName === undefined) throw new Error("XML document has no root element");
  return toElement(doc[rootName], rootName);
}

function child(el: XmlElement, uri: string, local: string): XmlElement | undefined {
  return el.children.find((c) => c.uri === uri && c.local === local);
}

function childrenOf(el: XmlElement, uri: string, local: string): XmlElement[] {
  return el.children.filter((c) => c.uri === uri && c.local === local);
}

function textOf(el: XmlElement, uri: string, local: string): string | undefined {
  return child(el, uri, local)?.text;
}

function toInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number.parseInt(value, 10);
  return Number.isNaN(n) ? undefined : n;
}

function toBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value.trim().toLowerCase() === "true";
}

function readLinks(el: XmlElement): Link[] {
  return childrenOf(el, NS.atom, "link").map((l) => {
    const link: Link = {};
    if (l.attributes.rel !== undefined) link.rel = l.attributes.rel;
    if (l.attributes.href !== undefined) link.href = l.attributes.href;
    if (l.attributes.type !== undefined) link.type = l.attributes.type;
    return link;
  });
}

function readPrice(el: XmlElement): Price {
  return { unit: el.attributes.unit ?? "", value: el.text.trim() };
}

function readAttribute(el: XmlElement): Attribute {
  const a: Attribute = { value: el.text };
  if (el.attributes.name !== undefined) a.name = el.attributes.name;
  if (el.attributes.type !== undefined) a.type = el.attributes.type;
  if (el.attributes.unit !== undefined) a.unit = el.attributes.unit;
  return a;
}

export function readServiceErrors(el: XmlElement): ServiceError[] {
  return childrenOf(el, NS.gd, "error").map((e) => {
    const err: ServiceError = {};
    const domain = textOf(e, NS.gd, "domain");
    const code = textOf(e, NS.gd, "code");
    const location = child(e, NS.gd, "location");
    const internalReason = textOf(e, NS.gd, "internalReason");
    if (domain !== undefined) err.domain = domain;
    if (code !== undefined) err.code = code;
    if (location) {
      err.location = location.text;
      if (location.attributes.type !== undefined) err.locationType = location.attributes.type;
    }
    if (internalReason !== undefined) err.internalReason = internalReason;
    return err;
  });
}

function readContent(el: XmlElement): Content {
  const content: Content = { value: el.text };
  if (el.attributes.type !== undefined) content.type = el.attributes.type;
  const errors = child(el, NS.gd, "errors");
  if (errors) content.errors = readServiceErrors(errors);
  return content;
}

function readShipping(el: XmlElement): Shipping {
  const s: Shipping = {};
  const country = textOf(el, NS.scp, "shipping_country");
  const region = textOf(el, NS.scp, "shipping_region");
  const service = textOf(el, NS.scp, "shipping_service");
  const price = child(el, NS.scp, "shipping_price");
  if (country !== undefined) s.country = country;
  if (region !== undefined) s.region = region;
  if (service !== undefined) s.service = service;
  if (price) s.price = readPrice(price);
  return s;
}

function readTax(el: XmlElement): Tax {
  const t: Tax = {};
  const country = textOf(el, NS.scp, "tax_country");
  const region = textOf(el, NS.scp, "tax_region");
  const rate = textOf(el, NS.scp, "tax_rate");
  const ship = toBoolean(textOf(el, NS.scp, "tax_ship"));
  if (country !== undefined) t.country = country;
  if (region !== undefined) t.region = region;
  if (rate !== undefined && !Number.isNaN(Number.parseFloat(rate))) t.rate = Number.parseFloat(rate);
  if (ship !== undefined) t.shippingIsTaxed = ship;
  return t;
}

function readBatchOperation(value: string | undefined): BatchOperationType | undefined {
  return value === "insert" || value === "update" || value === "delete" ? value : undefined;
}

export function readProduct(el: XmlElement): Product {
  const p: Product = { links: readLinks(el) };
  const atomId = textOf(el, NS.atom, "id");
  const title = textOf(el, NS.atom, "title");
  const content = child(el, NS.atom, "content");
  const control = child(el, NS.app, "control");
  if (atomId !== undefined) p.atomId = atomId;
  if (title !== undefined) p.title = title;
  if (content) p.content = readContent(content);
  if (control) {
    p.appControl = {
      requiredDestinations: childrenOf(control, NS.sc, "required_destination").map((d) => d.attributes.dest ?? ""),
      excludedDestinations: childrenOf(control, NS.sc, "excluded_destination").map((d) => d.attributes.dest ?? ""),
    };
  }

  for (const [key, prefix, tag] of STRING_FIELDS) {
    const value = textOf(el, NS[prefix], tag);
    if (value !== undefined) p[key] = value;
  }
  for (const [key, prefix, tag] of LIST_FIELDS) {
    const values = childrenOf(el, NS[prefix], tag).map((c) => c.text);
    if (values.length > 0) p[key] = values;
  }
  for (const [key, prefix, tag] of BOOLEAN_FIELDS) {
    const value = toBoolean(textOf(el, NS[prefix], tag));
    if (value !== undefined) p[key] = value;
  }

  const attributes = childrenOf(el, NS.sc, "attribute").map(readAttribute);
  if (attributes.length > 0) p.attributes = attributes;
  const groups: AttributeGroup[] = childrenOf(el, NS.sc, "group").map((g) => ({
    ...(g.attributes.name !== undefined ? { name: g.attributes.name } : {}),
    attributes: childrenOf(g, NS.sc, "attribute").map(readAttribute),
  }));
  if (groups.length > 0) p.attributeGroups = groups;

  const price = child(el, NS.scp, "price");
  if (price) p.price = readPrice(price);
  const quantity = toInt(textOf(el, NS.scp, "quantity"));
  if (quantity !== undefined) p.quantity = quantity;
  const shipping = childrenOf(el, NS.scp, "shipping").map(readShipping);
  if (shipping.length > 0) p.shippingRules = shipping;
  const weight = child(el, NS.scp, "shipping_weight");
  if (weight) p.shippingWeight = readPrice(weight);
  const taxes = childrenOf(el, NS.scp, "tax").map(readTax);
  if (taxes.length > 0) p.taxes = taxes;

  const operation = readBatchOperation(child(el, NS.batch, "operation")?.attributes.type);
  if (operation) p.batchOperation = operation;
  const batchId = textOf(el, NS.batch, "id");
  if (batchId !== undefined) p.batchId = batchId;
  const status = child(el, NS.batch, "status");
  if (status) {
    p.batchStatus = { code: toInt(status.attributes.code) ?? 0 };
    if (status.attributes.reason !== undefined) p.batchStatus.reason = status.attributes.reason;
  }
  const interrupted = child(el, NS.batch, "interrupted");
  if (interrupted) {
    const a = interrupted.attributes;
    p.batchInterrupted = {};
    const error = toInt(a.error);
    const parsed = toInt(a.parsed);
    const success = toInt(a.success);
    const unprocessed = toInt(a.unprocessed);
    if (error !== undefined) p.batchInterrupted.error = error;
    if (parsed !== undefined) p.batchInterrupted.parsed = parsed;
    if (a.reason !== undefined) p.batchInterrupted.reason = a.reason;
    if (success !== undefined) p.batchInterrupted.success = success;
    if (unprocessed !== undefined) p.batchInterrupted.unprocessed = unprocessed;
  }
  return p;
}

function readDataFeed(el: XmlElement): DataFeed {
  const feed: DataFeed = { links: readLinks(el) };
  const atomId = textOf(el, NS.atom, "id");
  const title = textOf(el, NS.atom, "title");
  const fileName = textOf(el, NS.sc, "feed_file_name");
  const country = textOf(el, NS.sc, "target_country");
  const language = textOf(el, NS.sc, "content_language");
  const format = child(el, NS.sc, "file_format");
  if (atomId !== undefined) feed.atomId = atomId;
  if (title !== undefined) feed.title = title;
  if (fileName !== undefined) feed.feedFileName = fileName;
  if (country !== undefined) feed.targetCountry = country;
  if (language !== undefined) feed.contentLanguage = language;
  if (format) {
    feed.fileFormat = {};
    const delimiter = textOf(format, NS.sc, "delimiter");
    const encoding = textOf(format, NS.sc, "encoding");
    const quoted = textOf(format, NS.sc, "use_quoted_fields");
    if (format.attributes.format !== undefined) feed.fileFormat.format = format.attributes.format;
    if (delimiter !== undefined) feed.fileFormat.delimiter = delimiter;
    if (encoding !== undefined) feed.fileFormat.encoding = encoding;
    if (quoted !== undefined) feed.fileFormat.useQuotedFields = quoted;
  }
  return feed;
}

function expectRoot(el: XmlElement, local: string): XmlElement {
  if (el.uri !== NS.atom || el.local !== local) {
    throw new Error(`Expected Atom <${local}> but got <${el.local}> (${el.uri || "no namespace"})`);
  }
  return el;
}

export async function parseProduct(xml: string): Promise<Product> {
  return readProduct(expectRoot(await parseXml(xml), "entry"));
}

export async function parseProductFeed(xml: string): Promise<ProductFeed> {
  const root = expectRoot(await parseXml(xml), "feed");
  const feed: ProductFeed = {
    links: readLinks(root),
    entries: childrenOf(root, NS.atom, "entry").map(readProduct),
  };
  const id = textOf(root, NS.atom, "id");
  const updated = textOf(root, NS.atom, "updated");
  if (id !== undefined) feed.id = id;
  if (updated !== undefined) feed.updated = updated;
  return feed;
}

export async function parseDataFeed(xml: string): Promise<DataFeed> {
  return readDataFeed(expectRoot(await parseXml(xml), "entry"));
}

export async function parseDataFeedFeed(xml: string): Promise<DataFeed[]> {
  const root = expectRoot(await parseXml(xml), "feed");
  return childrenOf(root, NS.atom, "entry").map(readDataFeed);
}

/** Parses a gd:errors document (content type application/vnd.google.gdata.error+xml). */
export async function parseServiceErrors(xml: string): Promise<ServiceError[]> {
  return readServiceErrors(await parseXml(xml));
}
