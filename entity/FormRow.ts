import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from "typeorm";
import { Pronunciation, Tag } from "../types";
import { EntryRow } from "./EntryRow";

@Entity("forms")
export class FormRow {
  @PrimaryGeneratedColumn({ name: "row_id" })
  rowId!: number;

  @Column({ type: "integer", name: "entry_row_id" })
  entryRowId!: number;

  @ManyToOne(() => EntryRow, { onDelete: "CASCADE" })
  @JoinColumn({ name: "entry_row_id" })
  entry!: EntryRow;

  @Column({ type: "varchar" })
  form!: string;

  @Column({ type: "varchar", nullable: true })
  script!: string | null;

  @Column("simple-json", { nullable: true })
  pronunciations!: Pronunciation[] | null;

  @Column("simple-json")
  tags!: Tag[];
}
