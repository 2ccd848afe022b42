import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from "typeorm";
import { Meta } from "../types";
import { SynsetRow } from "./SynsetRow";

@Entity("synset_relations")
export class SynsetRelationRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "integer", name: "source_row_id" })
  sourceRowId!: number;

  @ManyToOne(() => SynsetRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "source_row_id" })
  source!: SynsetRow;

  @Column({ type: "integer", name: "target_row_id" })
  targetRowId!: number;

  @ManyToOne(() => SynsetRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "target_row_id" })
  target!: SynsetRow;

  @Column({ type: "varchar" })
  type!: string;

  @Column("simple-json", { nullable: true })
  metadata!: Meta | null;
}
