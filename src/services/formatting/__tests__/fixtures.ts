/**
 * Shared inventory for formatter tests.
 */

import { listing } from "../../../test/mocks/listingFactory.js";

export const foilGermanBolt = listing({
  marketplaceId: "x",
  name: "Bolt",
  location: "B-0-0-1",
  price: 1,
  quantity: 1,
  language: "German",
  isFoil: true,
  comment: "corner",
});

export const englishBolts = listing({
  marketplaceId: "y",
  name: "Bolt",
  location: "A-0-2-1",
  price: 2,
  quantity: 4,
});

export const optPlayset = listing({
  marketplaceId: "z",
  name: "Opt",
  setName: "Ixalan",
  setCode: "XLN",
  collectorNumber: "65",
  location: null,
  price: 0.1,
  quantity: 1,
  isPlayset: true,
  localizedNames: { de: "", es: "", fr: "", it: "" },
});
