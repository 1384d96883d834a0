export { extractArticle } from './article-extractor.js';
