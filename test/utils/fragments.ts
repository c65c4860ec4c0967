import { Document } from '@langchain/core/documents';
import type {
  Fragment,
  FragmentMetadata,
} from '../../src/indexing/stages/chunk/types';
import { fragmentId } from '../../src/indexing/stages/chunk/types';

export function makeFragment(
  source: string,
  chunkIndex: number,
  pageContent: string,
  metadata: Partial<FragmentMetadata> = {},
): Fragment {
  return new Document<FragmentMetadata>({
    id: fragmentId(source, chunkIndex),
    pageContent,
    metadata: {
      source,
      title: 'Bulletin de la Société',
      date: '1923',
      year: 1923,
      persons: [],
      ...metadata,
    },
  });
}

// Three documents on distinct topics, two fragments each
export const SAMPLE_FRAGMENTS: Fragment[] = [
  makeFragment('paludisme.xml', 0, 'Le paludisme est causé par Plasmodium', {
    title: 'Séance sur le paludisme',
    date: '14 mars 1923',
  }),
  makeFragment('paludisme.xml', 1, 'Les moustiques anopheles transmettent le parasite', {
    title: 'Séance sur le paludisme',
    date: '14 mars 1923',
  }),
  makeFragment('cholera.xml', 0, 'Le cholera se propage par les eaux contaminees', {
    title: 'Épidémie de choléra',
    date: '1925',
    year: 1925,
  }),
  makeFragment('cholera.xml', 1, 'Les quarantaines portuaires limitent la contagion', {
    title: 'Épidémie de choléra',
    date: '1925',
    year: 1925,
  }),
  makeFragment('vaccins.xml', 0, 'La vaccination antivariolique progresse dans les colonies', {
    title: 'Rapport sur la vaccine',
    date: 'Unknown Date',
    year: null,
    persons: ['Albert Calmette'],
  }),
  makeFragment('vaccins.xml', 1, 'Le vaccin BCG est essaye sur les nourrissons', {
    title: 'Rapport sur la vaccine',
    date: 'Unknown Date',
    year: null,
    persons: ['Albert Calmette'],
  }),
];
