import { Kind } from "graphql";
import { gql } from "graphql-tag";

import { createFragmentMap, getFragmentDefinitions } from "../index.js";

const document = gql`
  query Shelf {
    shelf {
      ...ShelfBooks
    }
  }

  fragment ShelfBooks on Shelf {
    books {
      ...BookTitle
    }
  }

  fragment BookTitle on Book {
    title
  }
`;

test("collects the fragment definitions of a document in order", () => {
  const fragments = getFragmentDefinitions(document);

  expect(fragments.map((fragment) => fragment.kind)).toEqual([
    Kind.FRAGMENT_DEFINITION,
    Kind.FRAGMENT_DEFINITION,
  ]);
  expect(fragments.map((fragment) => fragment.name.value)).toEqual([
    "ShelfBooks",
    "BookTitle",
  ]);
});

test("maps fragment names to their definitions", () => {
  const fragments = getFragmentDefinitions(document);
  const fragmentMap = createFragmentMap(fragments);

  expect(Object.keys(fragmentMap)).toEqual(["ShelfBooks", "BookTitle"]);
  expect(fragmentMap.ShelfBooks).toBe(fragments[0]);
  expect(fragmentMap.BookTitle).toBe(fragments[1]);
});

test("creates an empty map without fragments", () => {
  expect(Object.keys(createFragmentMap())).toEqual([]);
  expect(getFragmentDefinitions(gql`{ shelf { id } }`)).toEqual([]);
});

test("does not look up names on the object prototype", () => {
  const fragmentMap = createFragmentMap(getFragmentDefinitions(document));

  expect("toString" in fragmentMap).toBe(false);
});
