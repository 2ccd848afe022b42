import { Entity, PrimaryGeneratedColumn, Column, Index, ManyToOne, JoinColumn } from "typeorm";
import { Meta } from "../types";
import { EntryRow } from "./EntryRow";
import { LexiconRow } from "./LexiconRow";
import { SynsetRow } from "./SynsetRow";

@Entity("senses")
@Index(["lexiconRowId", "id"], { unique: true })
export class SenseRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "varchar" })
  id!: string;

  @Column({ type: "integer", name: "lexicon_row_id" })
  lexiconRowId!: number;

  @ManyToOne(() => LexiconRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "lexicon_row_id" })
  lexicon!: LexiconRow;

  @Column({ type: "integer", name: "entry_row_id" })
  entryRowId!: number;

  @ManyToOne(() => EntryRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "entry_row_id" })
  entry!: EntryRow;

  @Column({ type: "integer", name: "synset_row_id" })
  synsetRowId!: number;

  @ManyToOne(() => SynsetRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "synset_row_id" })
  synset!: SynsetRow;

  @Column({ type: "varchar", nullable: true })
  adjposition!: string | null;

  @Column("simple-json", { nullable: true })
  subcat!: string[] | null;

  @Column("simple-json", { nullable: true })
  metadata!: Meta | null;
}
