import { Entity, PrimaryColumn, Column } from "typeorm";

/** Key/value facts about the store itself, e.g. its schema version. */
@Entity("store_meta")
export class StoreMeta {
  @PrimaryColumn({ type: "varchar" })
  key!: string;

  @Column({ type: "varchar" })
  value!: string;
}
