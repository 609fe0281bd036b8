/**
 * Product, feed and error shapes of the structured-content Atom API.
 * Field names follow the XML tags they map to (see atom.ts).
 */

export type Link = {
  rel?: string;
  href?: string;
  type?: string;
};

export type Content = {
  type?: string;
  value?: string;
  /** Present on batch response entries that failed (gd:errors). */
  errors?: ServiceError[];
};

export type AppControl = {
  requiredDestinations: string[];
  excludedDestinations: string[];
};

/** Decimal amounts are kept as strings so no precision is lost on the way through. */
export type Price = { unit: string; value: string };

export type ShippingWeight = { unit: string; value: string };

export type Shipping = {
  country?: string;
  region?: string;
  service?: string;
  price?: Price;
};

export type Tax = {
  country?: string;
  region?: string;
  rate?: number;
  shippingIsTaxed?: boolean;
};

export type Attribute = {
  name?: string;
  type?: string;
  unit?: string;
  value?: string;
};

export type AttributeGroup = {
  name?: string;
  attributes: Attribute[];
};

export type BatchOperationType = "insert" | "update" | "delete";

export type BatchStatus = { code: number; reason?: string };

/** Marker entry the server appends when it stopped processing a batch early. */
export type BatchInterrupted = {
  error?: number;
  parsed?: number;
  reason?: string;
  success?: number;
  unprocessed?: number;
};

export type Product = {
  // atom
  atomId?: string;
  title?: string;
  content?: Content;
  links: Link[];
  appControl?: AppControl;

  // sc
  externalId?: string;
  lang?: string;
  country?: string;
  channel?: string;
  expirationDate?: string;
  imageLinks?: string[];
  additionalImageLinks?: string[];
  adult?: boolean;
  attributes?: Attribute[];
  attributeGroups?: AttributeGroup[];

  // scp
  adwordsGrouping?: string;
  adwordsLabels?: string[];
  adwordsRedirect?: string;
  adwordsQueryparam?: string[];
  ageGroup?: string;
  author?: string;
  availability?: string;
  brand?: string;
  colors?: string[];
  condition?: string;
  edition?: string;
  feature?: string[];
  featuredProduct?: boolean;
  gender?: string;
  genre?: string;
  googleProductCategory?: string;
  gtin?: string;
  itemGroupId?: string;
  manufacturer?: string;
  material?: string;
  mpn?: string;
  pattern?: string;
  price?: Price;
  productReviewAverage?: string;
  productReviewCount?: string;
  productType?: string;
  quantity?: number;
  shippingRules?: Shipping[];
  shippingWeight?: ShippingWeight;
  size?: string;
  taxes?: Tax[];
  year?: string;

  // batch
  batchOperation?: BatchOperationType;
  batchId?: string;
  batchStatus?: BatchStatus;
  batchInterrupted?: BatchInterrupted;
};

export type ProductFeed = {
  id?: string;
  updated?: string;
  links: Link[];
  entries: Product[];
};

export type ServiceError = {
  domain?: string;
  code?: string;
  location?: string;
  locationType?: string;
  internalReason?: string;
};

/** One item of a batch that did not succeed. */
export type BatchError = {
  id?: string;
  code: number;
  reason?: string;
  serviceErrors?: ServiceError[];
};

export type FileFormat = {
  format?: string;
  delimiter?: string;
  encoding?: string;
  useQuotedFields?: string;
};

export type DataFeed = {
  atomId?: string;
  title?: string;
  links: Link[];
  feedFileName?: string;
  targetCountry?: string;
  contentLanguage?: string;
  fileFormat?: FileFormat;
};

export function newProduct(fields: Partial<Product> = {}): Product {
  return { lang: "en", country: "US", ...fields, links: fields.links ?? [] };
}

/** href of the first link with the given rel, if any. */
export function findLink(links: Link[] | undefined, rel: string): string | undefined {
  return links?.find((l) => l.rel === rel)?.href;
}

export function isSuccessStatus(code: number): boolean {
  return code >= 200 && code < 300;
}
