import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from "typeorm";
import { Meta } from "../types";
import { SynsetRow } from "./SynsetRow";

@Entity("definitions")
export class DefinitionRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "integer", name: "synset_row_id" })
  synsetRowId!: number;

  @ManyToOne(() => SynsetRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "synset_row_id" })
  synset!: SynsetRow;

  @Column({ type: "text" })
  definition!: string;

  @Column({ type: "varchar", nullable: true })
  language!: string | null;

  // Sense id as written; it may name a sense outside this lexicon.
  @Column({ type: "varchar", name: "source_sense", nullable: true })
  sourceSense!: string | null;

  @Column("simple-json", { nullable: true })
  metadata!: Meta | null;
}
