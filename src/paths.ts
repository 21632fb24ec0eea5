import path from 'path';

// src/ and dist/ both sit one level below the package root
export const PACKAGE_ROOT = path.resolve(__dirname, '..');

export const DEFAULT_DATA_PATH = path.join(PACKAGE_ROOT, 'data', 'sample_kdrama.csv');
export const ENGLISH_STOPWORDS_PATH = path.join(PACKAGE_ROOT, 'data', 'stopwords', 'english.txt');
export const TEMPLATES_DIR = path.join(PACKAGE_ROOT, 'templates');
