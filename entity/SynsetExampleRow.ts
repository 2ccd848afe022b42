import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from "typeorm";
import { Meta } from "../types";
import { SynsetRow } from "./SynsetRow";

@Entity("synset_examples")
export class SynsetExampleRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "integer", name: "synset_row_id" })
  synsetRowId!: number;

  @ManyToOne(() => SynsetRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "synset_row_id" })
  synset!: SynsetRow;

  @Column({ type: "text" })
  example!: string;

  @Column({ type: "varchar", nullable: true })
  language!: string | null;

  @Column("simple-json", { nullable: true })
  metadata!: Meta | null;
}
