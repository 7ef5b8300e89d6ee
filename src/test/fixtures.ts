import type { StyleDocument } from "../types.js";

const stroke = { strokeColor: "#000000", strokeWidth: 1 };

/** Three-band population style, as authored: the middle band is unsatisfiable. */
export const populationDoc: StyleDocument = {
  name: "county_poptot",
  property: "number",
  rules: [
    {
      title: "> 250K",
      predicate: { type: "greater_or_equal", property: "number", threshold: 250000 },
      fillColor: "#666666",
      ...stroke,
    },
    {
      title: "> 50K",
      predicate: {
        type: "and",
        operands: [
          { type: "greater_or_equal", property: "number", threshold: 50000 },
          { type: "less_than", property: "number", threshold: 25000 },
        ],
      },
      fillColor: "#ABABAB",
      ...stroke,
    },
    {
      title: "< 25K",
      predicate: { type: "less_than", property: "number", threshold: 25000 },
      fillColor: "#DCDCDC",
      ...stroke,
    },
  ],
};

/** Same style with the middle band's upper bound corrected to 250000. */
export const correctedPopulationDoc: StyleDocument = {
  ...populationDoc,
  rules: populationDoc.rules.map((rule) =>
    rule.title === "> 50K"
      ? {
          ...rule,
          predicate: {
            type: "and",
            operands: [
              { type: "greater_or_equal", threshold: 50000 },
              { type: "less_than", threshold: 250000 },
            ],
          },
        }
      : rule
  ),
};
