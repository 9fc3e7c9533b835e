export { action } from "~/routes/qbr.generate.server";
