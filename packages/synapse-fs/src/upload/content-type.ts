const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const CONTENT_TYPES: Record<string, string> = {
  txt: 'text/plain',
  csv: 'text/csv',
  tsv: 'text/tab-separated-values',
  json: 'application/json',
  xml: 'application/xml',
  html: 'text/html',
  htm: 'text/html',
  pdf: 'application/pdf',
  gz: 'application/gzip',
  gzip: 'application/gzip',
  zip: 'application/zip',
  tar: 'application/x-tar',
  bam: 'application/octet-stream',
  vcf: 'text/plain',
  fastq: 'text/plain',
  fq: 'text/plain',
  fasta: 'text/plain',
  fa: 'text/plain',
  bed: 'text/plain',
};

export const detectContentType = (fileName: string): string => {
  const dot = fileName.lastIndexOf('.');
  if (dot < 0 || dot === fileName.length - 1) {
    return DEFAULT_CONTENT_TYPE;
  }
  const extension = fileName.slice(dot + 1).toLowerCase();
  return CONTENT_TYPES[extension] ?? DEFAULT_CONTENT_TYPE;
};
