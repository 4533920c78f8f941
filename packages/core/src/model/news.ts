import { NewsArticleSchema } from "@appsource/schema";
import { missingKeys, readFields, reportMissingKeys, writeFields, type ReadContext } from "./fields.js";
import type { NewsArticle, RawRecord } from "./types.js";

const NEWS_KEYS = Object.keys(NewsArticleSchema.shape);

export function readNewsArticle(raw: RawRecord, context: ReadContext): NewsArticle {
  const { fields, extensions } = readFields(NewsArticleSchema, raw, context);
  reportMissingKeys("news", fields, context);
  return { ...fields, extensions };
}

export function isNewsArticleValid(article: NewsArticle) {
  return missingKeys("news", article).length === 0;
}

export function writeNewsArticle(article: NewsArticle, fullDocument: boolean): RawRecord {
  return writeFields(NEWS_KEYS, article, article.extensions, fullDocument);
}

/** Overwrites the article with the same identifier in place, otherwise appends. */
export function upsertNewsArticle(news: NewsArticle[], article: NewsArticle): "added" | "replaced" {
  const index = news.findIndex((entry) => entry.identifier === article.identifier);
  if (index === -1) {
    news.push(article);
    return "added";
  }
  news[index] = article;
  return "replaced";
}
