export type GroupType = "train" | "val";

export const group_types = ["train", "val"] satisfies Array<GroupType>;

/** sub-directories of each group */
export const data_types = ["images", "labels"] as const;
