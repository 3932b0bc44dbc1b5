import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import Page, { type PageProps } from '../components/Page';

const DOCTYPE = '<!DOCTYPE html>';

export const renderPage = (props: PageProps): string => {
  const markup = renderToStaticMarkup(<Page {...props} />);
  // Some React releases already emit the doctype for an <html> root.
  return /^<!doctype html>/i.test(markup) ? markup : `${DOCTYPE}${markup}`;
};
