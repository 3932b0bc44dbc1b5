import { mountPresentation } from './mount';

mountPresentation(document);
